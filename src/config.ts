import { DEFAULT_TAX_RATE } from './pricing';

export interface Config {
  productsTable: string;
  ordersTable: string;
  taxRate: number;
  dynamoEndpoint?: string | undefined;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseTaxRate(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_TAX_RATE;

  const rate = Number(raw);
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new Error(`TAX_RATE must be a number between 0 and 1, got "${raw}"`);
  }
  return rate;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    productsTable: required(env, 'PRODUCTS_TABLE'),
    ordersTable: required(env, 'ORDERS_TABLE'),
    taxRate: parseTaxRate(env['TAX_RATE']),
    dynamoEndpoint: env['DYNAMODB_ENDPOINT'] || undefined,
  };
}
