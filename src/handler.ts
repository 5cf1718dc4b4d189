import { randomUUID } from 'crypto';
import type {
  APIGatewayProxyEvent,
  APIGatewayProxyHandler,
  APIGatewayProxyResult,
} from 'aws-lambda';
import { processCheckout } from './checkout';
import type { CheckoutDeps } from './checkout';
import { loadConfig } from './config';
import { internalError, noContent, notFound, ok, validationError } from './http';
import { log } from './logger';
import { createDocumentClient, createRepository } from './repository';
import type { CatalogRepository, StoreDiagnostics } from './repository';
import type { CheckoutResult, LineItem } from './types';
import { validateCheckoutRequest, validateNewProduct } from './validation';

export interface HandlerDeps extends CheckoutDeps {
  catalog: CatalogRepository;
  store: StoreDiagnostics;
}

export type ApiHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

// ---------------------------------------------------------------------------
// Wire format
// ---------------------------------------------------------------------------

function toWireLineItem(item: LineItem) {
  return {
    product_id: item.productId,
    title: item.title,
    quantity: item.quantity,
    unit_price: item.unitPrice,
    line_total: item.lineTotal,
  };
}

function toWireCheckoutResult(result: CheckoutResult) {
  return {
    order_id: result.orderId,
    invoice_number: result.invoiceNumber,
    subtotal: result.subtotal,
    tax: result.tax,
    total: result.total,
    items: result.items.map(toWireLineItem),
  };
}

function parseBody(event: APIGatewayProxyEvent): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(event.body ?? '') };
  } catch {
    return { ok: false };
  }
}

// Diagnostic error text is cut short before it reaches the response body.
const DIAGNOSTIC_ERROR_LENGTH = 50;

function normalizePath(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, '') : path;
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

async function checkoutRoute(deps: HandlerDeps, event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const start = Date.now();

  const body = parseBody(event);
  if (!body.ok) {
    log({ level: 'warn', action: 'checkout.rejected', reason: 'Invalid JSON body' });
    return validationError('Invalid JSON body');
  }

  const validation = validateCheckoutRequest(body.value);
  if (!validation.ok) {
    log({ level: 'warn', action: 'checkout.rejected', reason: validation.message });
    return validationError(validation.message);
  }

  const req = validation.value;
  log({ level: 'info', action: 'checkout.start', itemCount: req.items.length });

  const result = await processCheckout(deps, req);
  if (!result.ok) {
    const { error } = result;
    if (error.error === 'VALIDATION_ERROR') {
      log({ level: 'warn', action: 'checkout.rejected', reason: error.message, durationMs: Date.now() - start });
      return validationError(error.message, error.missingProductIds);
    }
    log({ level: 'error', action: 'checkout.error', reason: error.message, error: String(error.cause), durationMs: Date.now() - start });
    return internalError(error.message);
  }

  const order = result.value;
  log({
    level: 'info',
    action: 'checkout.complete',
    orderId: order.orderId,
    invoiceNumber: order.invoiceNumber,
    total: order.total,
    durationMs: Date.now() - start,
  });
  return ok(toWireCheckoutResult(order));
}

async function createProductRoute(deps: HandlerDeps, event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const start = Date.now();

  const body = parseBody(event);
  if (!body.ok) {
    log({ level: 'warn', action: 'products.create.rejected', reason: 'Invalid JSON body' });
    return validationError('Invalid JSON body');
  }

  const validation = validateNewProduct(body.value);
  if (!validation.ok) {
    log({ level: 'warn', action: 'products.create.rejected', reason: validation.message });
    return validationError(validation.message);
  }

  log({ level: 'info', action: 'products.create.start' });
  const id = await deps.catalog.createProduct(validation.value);
  log({ level: 'info', action: 'products.create.complete', productId: id, durationMs: Date.now() - start });
  return ok({ id });
}

async function listProductsRoute(deps: HandlerDeps): Promise<APIGatewayProxyResult> {
  const start = Date.now();
  log({ level: 'info', action: 'products.list.start' });

  const products = await deps.catalog.listProducts();
  log({ level: 'info', action: 'products.list.complete', count: products.length, durationMs: Date.now() - start });
  return ok(products);
}

/** Reports whether the backend is up and its tables are reachable. */
async function diagnosticsRoute(deps: HandlerDeps): Promise<APIGatewayProxyResult> {
  try {
    const tables = await deps.store.describeTables();
    const ready = tables.products.status === 'ACTIVE' && tables.orders.status === 'ACTIVE';
    return ok({
      backend: 'running',
      database: ready ? 'connected' : 'tables not ready',
      connection_status: 'Connected',
      tables,
    });
  } catch (err) {
    log({ level: 'warn', action: 'diagnostics.error', error: String(err) });
    return ok({
      backend: 'running',
      database: 'error',
      connection_status: 'Not Connected',
      error: String(err).slice(0, DIAGNOSTIC_ERROR_LENGTH),
    });
  }
}

// ---------------------------------------------------------------------------
// Lambda handler
// ---------------------------------------------------------------------------

export function createHandler(deps: HandlerDeps): ApiHandler {
  return async (event) => {
    const method = event.httpMethod.toUpperCase();
    const path = normalizePath(event.path);

    try {
      if (method === 'OPTIONS') return noContent();

      switch (`${method} ${path}`) {
        case 'GET /':
          return ok({ message: 'Shopping API is running' });
        case 'GET /test':
          return await diagnosticsRoute(deps);
        case 'POST /api/checkout':
          return await checkoutRoute(deps, event);
        case 'POST /api/products':
          return await createProductRoute(deps, event);
        case 'GET /api/products':
          return await listProductsRoute(deps);
        default:
          return notFound(method, path);
      }
    } catch (err) {
      log({ level: 'error', action: 'request.error', method, path, error: String(err) });
      return internalError();
    }
  };
}

let defaultHandler: ApiHandler | undefined;

function buildDefaultHandler(): ApiHandler {
  const config = loadConfig();
  const repository = createRepository(createDocumentClient(config), config);
  return createHandler({
    catalog: repository,
    orders: repository,
    store: repository,
    generateId: randomUUID,
    taxRate: config.taxRate,
  });
}

export const handler: APIGatewayProxyHandler = async (event) => {
  if (!defaultHandler) {
    try {
      defaultHandler = buildDefaultHandler();
    } catch (err) {
      log({ level: 'error', action: 'handler.init', error: String(err) });
      return internalError();
    }
  }
  return defaultHandler(event);
};
