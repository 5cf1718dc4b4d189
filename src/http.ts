import type { APIGatewayProxyResult } from 'aws-lambda';
import type { ErrorResponse } from './types';

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  'Access-Control-Allow-Headers': '*',
} as const;

function json(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json', ...CORS_HEADERS },
    body: JSON.stringify(body),
  };
}

export function ok(body: unknown): APIGatewayProxyResult {
  return json(200, body);
}

export function noContent(): APIGatewayProxyResult {
  return { statusCode: 204, headers: { ...CORS_HEADERS }, body: '' };
}

export function validationError(message: string, missingProductIds?: string[]): APIGatewayProxyResult {
  const body: ErrorResponse = missingProductIds
    ? { error: 'VALIDATION_ERROR', message, missingProductIds }
    : { error: 'VALIDATION_ERROR', message };
  return json(400, body);
}

export function notFound(method: string, path: string): APIGatewayProxyResult {
  const body: ErrorResponse = { error: 'NOT_FOUND', message: `No route for ${method} ${path}` };
  return json(404, body);
}

export function internalError(message = 'An unexpected error occurred'): APIGatewayProxyResult {
  const body: ErrorResponse = { error: 'INTERNAL_ERROR', message };
  return json(500, body);
}
