import { DescribeTableCommand, ResourceNotFoundException } from '@aws-sdk/client-dynamodb';
import {
  BatchGetCommand,
  DynamoDBDocumentClient,
  PutCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import { createRepository, toProduct } from '../src/repository';
import type { Repository } from '../src/repository';

const TABLES = { productsTable: 'products-test', ordersTable: 'orders-test' };

let send: jest.Mock;
let repo: Repository;

function commandAt(index: number): unknown {
  return send.mock.calls[index]?.[0];
}

beforeEach(() => {
  send = jest.fn();
  const client = { send } as unknown as DynamoDBDocumentClient;
  let sequence = 0;
  repo = createRepository(client, TABLES, {
    generateId: () => `id-${++sequence}`,
    now: () => new Date('2026-03-01T12:00:00.000Z'),
  });
});

// ---------------------------------------------------------------------------
// toProduct
// ---------------------------------------------------------------------------

test('toProduct applies defaults for missing title and price', () => {
  expect(toProduct({ id: 'p1' })).toEqual({ id: 'p1', title: '', price: 0 });
});

test('toProduct reads numeric strings and keeps optional fields', () => {
  expect(toProduct({ id: 'p1', title: 'Mug', price: '12.5', category: 'kitchen', description: 'Blue' }))
    .toEqual({ id: 'p1', title: 'Mug', price: 12.5, category: 'kitchen', description: 'Blue' });
});

test('toProduct treats a non-numeric price as 0', () => {
  expect(toProduct({ id: 'p1', title: 'Mug', price: 'n/a' }).price).toBe(0);
});

test('toProduct rejects an item without an id', () => {
  expect(() => toProduct({ title: 'Mug' })).toThrow('Malformed product record: missing id');
});

// ---------------------------------------------------------------------------
// findProductsByIds
// ---------------------------------------------------------------------------

test('looks up distinct ids in a single BatchGet', async () => {
  send.mockResolvedValueOnce({
    Responses: { 'products-test': [{ id: 'a', title: 'A', price: 1 }, { id: 'b', title: 'B', price: 2 }] },
  });

  const products = await repo.findProductsByIds(['a', 'b', 'a']);

  expect(products).toEqual([
    { id: 'a', title: 'A', price: 1 },
    { id: 'b', title: 'B', price: 2 },
  ]);
  expect(send).toHaveBeenCalledTimes(1);
  expect(commandAt(0)).toBeInstanceOf(BatchGetCommand);
  expect(commandAt(0)).toMatchObject({
    input: { RequestItems: { 'products-test': { Keys: [{ id: 'a' }, { id: 'b' }] } } },
  });
});

test('follows UnprocessedKeys within the same lookup', async () => {
  send
    .mockResolvedValueOnce({
      Responses: { 'products-test': [{ id: 'a', title: 'A', price: 1 }] },
      UnprocessedKeys: { 'products-test': { Keys: [{ id: 'b' }] } },
    })
    .mockResolvedValueOnce({
      Responses: { 'products-test': [{ id: 'b', title: 'B', price: 2 }] },
      UnprocessedKeys: {},
    });

  const products = await repo.findProductsByIds(['a', 'b']);

  expect(products.map(p => p.id)).toEqual(['a', 'b']);
  expect(send).toHaveBeenCalledTimes(2);
  expect(commandAt(1)).toMatchObject({
    input: { RequestItems: { 'products-test': { Keys: [{ id: 'b' }] } } },
  });
});

test('fails when keys stay unprocessed', async () => {
  send.mockResolvedValue({
    Responses: { 'products-test': [] },
    UnprocessedKeys: { 'products-test': { Keys: [{ id: 'a' }] } },
  });

  await expect(repo.findProductsByIds(['a'])).rejects.toThrow('Product lookup left 1 keys unprocessed');
  expect(send).toHaveBeenCalledTimes(5);
});

test('splits more than 100 ids into several requests', async () => {
  send.mockResolvedValue({ Responses: { 'products-test': [] } });
  const ids = Array.from({ length: 250 }, (_, i) => `p${i}`);

  await repo.findProductsByIds(ids);

  expect(send).toHaveBeenCalledTimes(3);
});

test('propagates client errors', async () => {
  send.mockRejectedValueOnce(new Error('ResourceNotFoundException'));

  await expect(repo.findProductsByIds(['a'])).rejects.toThrow('ResourceNotFoundException');
});

// ---------------------------------------------------------------------------
// listProducts
// ---------------------------------------------------------------------------

test('scans every page of the products table', async () => {
  send
    .mockResolvedValueOnce({ Items: [{ id: 'a', title: 'A', price: 1 }], LastEvaluatedKey: { id: 'a' } })
    .mockResolvedValueOnce({ Items: [{ id: 'b', title: 'B' }] });

  const products = await repo.listProducts();

  expect(products).toEqual([
    { id: 'a', title: 'A', price: 1 },
    { id: 'b', title: 'B', price: 0 },
  ]);
  expect(commandAt(0)).toBeInstanceOf(ScanCommand);
  expect(commandAt(0)).toMatchObject({ input: { TableName: 'products-test' } });
  expect(commandAt(1)).toMatchObject({ input: { TableName: 'products-test', ExclusiveStartKey: { id: 'a' } } });
});

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

test('createProduct puts the product under a fresh id', async () => {
  send.mockResolvedValueOnce({});

  const id = await repo.createProduct({ title: 'Mug', price: 12.5 });

  expect(id).toBe('id-1');
  expect(commandAt(0)).toBeInstanceOf(PutCommand);
  expect(commandAt(0)).toMatchObject({
    input: {
      TableName: 'products-test',
      Item: { id: 'id-1', title: 'Mug', price: 12.5 },
      ConditionExpression: 'attribute_not_exists(id)',
    },
  });
});

test('createOrder stamps an id and creation time', async () => {
  send.mockResolvedValueOnce({});

  const orderId = await repo.createOrder({
    customerName: 'Test Customer',
    customerEmail: 'customer@example.com',
    customerAddress: '1 Test Street',
    items: [{ productId: 'a', title: 'A', quantity: 2, unitPrice: 10, lineTotal: 20 }],
    subtotal: 20,
    tax: 2,
    total: 22,
    invoiceNumber: 'INV-0000ABCD',
  });

  expect(orderId).toBe('id-1');
  expect(commandAt(0)).toBeInstanceOf(PutCommand);
  expect(commandAt(0)).toMatchObject({
    input: {
      TableName: 'orders-test',
      Item: { orderId: 'id-1', createdAt: '2026-03-01T12:00:00.000Z', total: 22, invoiceNumber: 'INV-0000ABCD' },
      ConditionExpression: 'attribute_not_exists(orderId)',
    },
  });
});

// ---------------------------------------------------------------------------
// describeTables
// ---------------------------------------------------------------------------

test('describeTables reports the status of both tables', async () => {
  send
    .mockResolvedValueOnce({ Table: { TableStatus: 'ACTIVE' } })
    .mockResolvedValueOnce({ Table: { TableStatus: 'CREATING' } });

  await expect(repo.describeTables()).resolves.toEqual({
    products: { name: 'products-test', status: 'ACTIVE' },
    orders: { name: 'orders-test', status: 'CREATING' },
  });
  expect(commandAt(0)).toBeInstanceOf(DescribeTableCommand);
  expect(commandAt(0)).toMatchObject({ input: { TableName: 'products-test' } });
  expect(commandAt(1)).toMatchObject({ input: { TableName: 'orders-test' } });
});

test('describeTables marks a missing table as NOT_FOUND', async () => {
  send
    .mockResolvedValueOnce({ Table: { TableStatus: 'ACTIVE' } })
    .mockRejectedValueOnce(new ResourceNotFoundException({ message: 'Requested resource not found', $metadata: {} }));

  await expect(repo.describeTables()).resolves.toEqual({
    products: { name: 'products-test', status: 'ACTIVE' },
    orders: { name: 'orders-test', status: 'NOT_FOUND' },
  });
});

test('describeTables propagates other client errors', async () => {
  send.mockRejectedValue(new Error('UnrecognizedClientException'));

  await expect(repo.describeTables()).rejects.toThrow('UnrecognizedClientException');
});
