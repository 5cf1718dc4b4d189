export interface Product {
  id: string;
  title: string;
  price: number;        // decimal currency units, >= 0
  description?: string;
  category?: string;
}

export type NewProduct = Omit<Product, 'id'>;

export interface CartItem {
  productId: string;
  quantity: number;     // integer >= 1
}

export interface CheckoutRequest {
  customerName: string;
  customerEmail: string;
  customerAddress: string;
  items: CartItem[];
}

export interface LineItem {
  productId: string;
  title: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;    // unitPrice * quantity
}

export interface OrderDraft {
  customerName: string;
  customerEmail: string;
  customerAddress: string;
  items: LineItem[];
  subtotal: number;     // sum of lineTotals
  tax: number;          // round(subtotal * taxRate, 2)
  total: number;        // round(subtotal + tax, 2)
  invoiceNumber: string;
}

export interface Order extends OrderDraft {
  orderId: string;      // UUID, assigned when persisted
  createdAt: string;    // ISO 8601 timestamp
}

export interface CheckoutResult {
  orderId: string;
  invoiceNumber: string;
  subtotal: number;
  tax: number;
  total: number;
  items: LineItem[];
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface ValidationError {
  error: 'VALIDATION_ERROR';
  message: string;
  missingProductIds?: string[];
}

export interface DependencyError {
  error: 'DEPENDENCY_ERROR';
  message: string;
  cause: unknown;       // collaborator failure, kept for logging only
}

export type CheckoutError = ValidationError | DependencyError;

export interface InternalError {
  error: 'INTERNAL_ERROR';
  message: string;
}

export interface NotFoundError {
  error: 'NOT_FOUND';
  message: string;
}

export type ErrorResponse = ValidationError | InternalError | NotFoundError;
