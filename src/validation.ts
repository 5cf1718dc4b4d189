import type { CartItem, CheckoutRequest, NewProduct } from './types';

export const MAX_QUANTITY = 10_000;

export type Validation<T> = { ok: true; value: T } | { ok: false; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function validateItem(item: unknown): Validation<CartItem> {
  if (!isRecord(item)) {
    return { ok: false, message: 'Each item must be an object' };
  }

  const productId = item['product_id'];
  const quantity = item['quantity'];

  if (!isNonEmptyString(productId)) {
    return { ok: false, message: 'Each item must have a product_id' };
  }
  if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity < 1) {
    return { ok: false, message: 'quantity must be an integer >= 1' };
  }
  if (quantity > MAX_QUANTITY) {
    return { ok: false, message: `quantity must not exceed ${MAX_QUANTITY}` };
  }

  return { ok: true, value: { productId, quantity } };
}

export function validateCheckoutRequest(body: unknown): Validation<CheckoutRequest> {
  if (!isRecord(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const customerName = body['customer_name'];
  const customerEmail = body['customer_email'];
  const customerAddress = body['customer_address'];
  const rawItems = body['items'];

  if (!isNonEmptyString(customerName)) {
    return { ok: false, message: 'Missing or invalid customer_name' };
  }
  if (!isNonEmptyString(customerEmail)) {
    return { ok: false, message: 'Missing or invalid customer_email' };
  }
  if (!isNonEmptyString(customerAddress)) {
    return { ok: false, message: 'Missing or invalid customer_address' };
  }
  if (!Array.isArray(rawItems) || rawItems.length === 0) {
    return { ok: false, message: 'Cart is empty' };
  }

  const items: CartItem[] = [];
  for (const raw of rawItems) {
    const item = validateItem(raw);
    if (!item.ok) return item;
    items.push(item.value);
  }

  return { ok: true, value: { customerName, customerEmail, customerAddress, items } };
}

export function validateNewProduct(body: unknown): Validation<NewProduct> {
  if (!isRecord(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const title = body['title'];
  const price = body['price'];
  const description = body['description'];
  const category = body['category'];

  if (!isNonEmptyString(title)) {
    return { ok: false, message: 'Missing or invalid title' };
  }
  if (typeof price !== 'number' || !Number.isFinite(price) || price < 0) {
    return { ok: false, message: 'price must be a non-negative number' };
  }

  const product: NewProduct = { title, price };
  if (description !== undefined) {
    if (typeof description !== 'string') {
      return { ok: false, message: 'description must be a string' };
    }
    product.description = description;
  }
  if (category !== undefined) {
    if (typeof category !== 'string') {
      return { ok: false, message: 'category must be a string' };
    }
    product.category = category;
  }

  return { ok: true, value: product };
}
