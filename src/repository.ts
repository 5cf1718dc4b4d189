import { randomUUID } from 'crypto';
import {
  DescribeTableCommand,
  DynamoDBClient,
  ResourceNotFoundException,
} from '@aws-sdk/client-dynamodb';
import {
  BatchGetCommand,
  type BatchGetCommandOutput,
  DynamoDBDocumentClient,
  PutCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import type { Config } from './config';
import type { NewProduct, Order, OrderDraft, Product } from './types';

export interface CatalogReader {
  findProductsByIds(ids: readonly string[]): Promise<Product[]>;
}

export interface CatalogRepository extends CatalogReader {
  listProducts(): Promise<Product[]>;
  createProduct(product: NewProduct): Promise<string>;
}

export interface OrderWriter {
  createOrder(draft: OrderDraft): Promise<string>;
}

export interface TableStatus {
  name: string;
  status: string;       // DynamoDB TableStatus, or NOT_FOUND
}

export interface StoreDiagnostics {
  describeTables(): Promise<{ products: TableStatus; orders: TableStatus }>;
}

export interface Repository extends CatalogRepository, OrderWriter, StoreDiagnostics {}

export interface Tables {
  productsTable: string;
  ordersTable: string;
}

export interface RepositoryOptions {
  generateId?: () => string;
  now?: () => Date;
}

// DynamoDB caps a single BatchGetItem request at 100 keys.
const BATCH_GET_LIMIT = 100;
const MAX_BATCH_ROUNDS = 5;

export function createDocumentClient(config: Pick<Config, 'dynamoEndpoint'>): DynamoDBDocumentClient {
  const base = config.dynamoEndpoint
    ? new DynamoDBClient({ endpoint: config.dynamoEndpoint })
    : new DynamoDBClient({});
  return DynamoDBDocumentClient.from(base, {
    marshallOptions: { removeUndefinedValues: true },
  });
}

/**
 * Converts a stored product item into a typed record.
 * A missing or non-numeric price reads as 0 and a missing title as "".
 */
export function toProduct(item: Record<string, unknown>): Product {
  const id = item['id'];
  if (typeof id !== 'string' || id === '') {
    throw new Error('Malformed product record: missing id');
  }

  const rawPrice = item['price'];
  const price = typeof rawPrice === 'number' ? rawPrice
    : typeof rawPrice === 'string' ? Number(rawPrice)
    : 0;

  const title = item['title'];
  const description = item['description'];
  const category = item['category'];

  const product: Product = {
    id,
    title: typeof title === 'string' ? title : '',
    price: Number.isFinite(price) ? price : 0,
  };
  if (typeof description === 'string') product.description = description;
  if (typeof category === 'string') product.category = category;
  return product;
}

function chunk<T>(values: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

export function createRepository(
  client: DynamoDBDocumentClient,
  tables: Tables,
  options: RepositoryOptions = {},
): Repository {
  const generateId = options.generateId ?? randomUUID;
  const now = options.now ?? (() => new Date());
  const { productsTable, ordersTable } = tables;

  /**
   * Reads one chunk of keys, following UnprocessedKeys for a bounded
   * number of rounds. Throttled leftovers past that bound fail the lookup.
   */
  async function batchGet(ids: readonly string[]): Promise<Product[]> {
    const products: Product[] = [];
    let keys: Record<string, unknown>[] | undefined = ids.map(id => ({ id }));

    for (let round = 0; keys && keys.length > 0; round++) {
      if (round === MAX_BATCH_ROUNDS) {
        throw new Error(`Product lookup left ${keys.length} keys unprocessed`);
      }

      const result: BatchGetCommandOutput = await client.send(
        new BatchGetCommand({
          RequestItems: { [productsTable]: { Keys: keys } },
        })
      );

      for (const item of result.Responses?.[productsTable] ?? []) {
        products.push(toProduct(item));
      }
      keys = result.UnprocessedKeys?.[productsTable]?.Keys;
    }

    return products;
  }

  async function describeTable(name: string): Promise<TableStatus> {
    try {
      const result = await client.send(new DescribeTableCommand({ TableName: name }));
      return { name, status: result.Table?.TableStatus ?? 'UNKNOWN' };
    } catch (err) {
      if (err instanceof ResourceNotFoundException) {
        return { name, status: 'NOT_FOUND' };
      }
      throw err;
    }
  }

  return {
    async findProductsByIds(ids) {
      const unique = [...new Set(ids)];
      const products: Product[] = [];
      for (const batch of chunk(unique, BATCH_GET_LIMIT)) {
        products.push(...await batchGet(batch));
      }
      return products;
    },

    async listProducts() {
      const products: Product[] = [];
      let lastKey: Record<string, unknown> | undefined;

      do {
        const result = await client.send(
          new ScanCommand({
            TableName: productsTable,
            ...(lastKey ? { ExclusiveStartKey: lastKey } : {}),
          })
        );
        for (const item of result.Items ?? []) {
          products.push(toProduct(item));
        }
        lastKey = result.LastEvaluatedKey;
      } while (lastKey);

      return products;
    },

    async createProduct(product) {
      const id = generateId();
      await client.send(
        new PutCommand({
          TableName: productsTable,
          Item: { ...product, id },
          ConditionExpression: 'attribute_not_exists(id)',
        })
      );
      return id;
    },

    async createOrder(draft) {
      const order: Order = {
        ...draft,
        orderId: generateId(),
        createdAt: now().toISOString(),
      };
      await client.send(
        new PutCommand({
          TableName: ordersTable,
          Item: order,
          ConditionExpression: 'attribute_not_exists(orderId)',
        })
      );
      return order.orderId;
    },

    async describeTables() {
      const [products, orders] = await Promise.all([
        describeTable(productsTable),
        describeTable(ordersTable),
      ]);
      return { products, orders };
    },
  };
}
