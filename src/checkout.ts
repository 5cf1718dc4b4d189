import { generateInvoiceNumber } from './invoice';
import { calculatePricing } from './pricing';
import type { CatalogReader, OrderWriter } from './repository';
import type {
  CheckoutError,
  CheckoutRequest,
  CheckoutResult,
  OrderDraft,
  Product,
  Result,
} from './types';
import { MAX_QUANTITY } from './validation';

export interface CheckoutDeps {
  catalog: CatalogReader;
  orders: OrderWriter;
  generateId: () => string;
  taxRate: number;
}

function validationError(message: string, missingProductIds?: string[]): { ok: false; error: CheckoutError } {
  return {
    ok: false,
    error: missingProductIds
      ? { error: 'VALIDATION_ERROR', message, missingProductIds }
      : { error: 'VALIDATION_ERROR', message },
  };
}

function dependencyError(message: string, cause: unknown): { ok: false; error: CheckoutError } {
  return { ok: false, error: { error: 'DEPENDENCY_ERROR', message, cause } };
}

/**
 * Prices a cart against the catalog and persists exactly one order.
 *
 * Either every requested product resolves or the whole cart is rejected;
 * the order is written only after all pricing has succeeded.
 */
export async function processCheckout(
  deps: CheckoutDeps,
  request: CheckoutRequest,
): Promise<Result<CheckoutResult, CheckoutError>> {
  if (request.items.length === 0) {
    return validationError('Cart is empty');
  }
  if (request.items.some(item => !Number.isInteger(item.quantity) || item.quantity < 1)) {
    return validationError('quantity must be an integer >= 1');
  }
  if (request.items.some(item => item.quantity > MAX_QUANTITY)) {
    return validationError(`quantity must not exceed ${MAX_QUANTITY}`);
  }

  const requestedIds = [...new Set(request.items.map(item => item.productId))];

  let products: Product[];
  try {
    products = await deps.catalog.findProductsByIds(requestedIds);
  } catch (err) {
    return dependencyError('Failed to load products', err);
  }

  const productsById = new Map<string, Product>();
  for (const product of products) {
    productsById.set(product.id, product);
  }

  const missing = requestedIds.filter(id => !productsById.has(id));
  if (missing.length > 0) {
    return validationError('One or more products not found', missing);
  }

  const pricing = calculatePricing(request.items, productsById, deps.taxRate);
  const invoiceNumber = generateInvoiceNumber(deps.generateId);

  const draft: OrderDraft = {
    customerName: request.customerName,
    customerEmail: request.customerEmail,
    customerAddress: request.customerAddress,
    items: pricing.items,
    subtotal: pricing.subtotal,
    tax: pricing.tax,
    total: pricing.total,
    invoiceNumber,
  };

  let orderId: string;
  try {
    orderId = await deps.orders.createOrder(draft);
  } catch (err) {
    return dependencyError('Failed to persist order', err);
  }

  return {
    ok: true,
    value: {
      orderId,
      invoiceNumber,
      subtotal: pricing.subtotal,
      tax: pricing.tax,
      total: pricing.total,
      items: pricing.items,
    },
  };
}
