import type { CartItem, LineItem, Product } from './types';

export const DEFAULT_TAX_RATE = 0.1;

export interface PricingResult {
  items: LineItem[];
  subtotal: number;
  tax: number;
  total: number;
}

/**
 * Rounds a number to 2 decimal places, ties half-up.
 */
export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Prices a cart against resolved products.
 *
 * Pricing rules:
 *   1. unitPrice = product.price, unrounded
 *   2. lineTotal = unitPrice × quantity, unrounded
 *   3. subtotal  = sum of lineTotals in cart order (reported to 2 decimals)
 *   4. tax       = round(subtotal × taxRate, 2)
 *   5. total     = round(subtotal + tax, 2)
 * Tax and total are taken from the unrounded subtotal.
 */
export function calculatePricing(
  items: readonly CartItem[],
  productsById: ReadonlyMap<string, Product>,
  taxRate: number = DEFAULT_TAX_RATE,
): PricingResult {
  const lineItems: LineItem[] = items.map(item => {
    const product = productsById.get(item.productId);
    if (!product) {
      throw new Error(`Product ${item.productId} was not resolved before pricing`);
    }

    return {
      productId: item.productId,
      title: product.title,
      quantity: item.quantity,
      unitPrice: product.price,
      lineTotal: product.price * item.quantity,
    };
  });

  const subtotal = lineItems.reduce((sum, item) => sum + item.lineTotal, 0);
  const tax = roundTo2(subtotal * taxRate);
  const total = roundTo2(subtotal + tax);

  return { items: lineItems, subtotal: roundTo2(subtotal), tax, total };
}
