const INVOICE_PREFIX = 'INV-';
const INVOICE_SUFFIX_LENGTH = 8;

/**
 * Short display identifier for an order: "INV-" followed by the last eight
 * characters of a fresh unique id (dashes removed, upper-cased).
 */
export function generateInvoiceNumber(generateId: () => string): string {
  const id = generateId().replace(/-/g, '').toUpperCase();
  return INVOICE_PREFIX + id.slice(-INVOICE_SUFFIX_LENGTH);
}
