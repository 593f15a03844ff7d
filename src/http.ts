import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { errorMessage } from './errors';
import { log } from './logger';

/** The part of an API Gateway proxy event the services read. */
export type ServiceRequest = Pick<APIGatewayProxyEvent, 'httpMethod' | 'path' | 'body'>;

export type ServiceHandler = (event: ServiceRequest) => Promise<APIGatewayProxyResult>;

export type Route = (
  method: string,
  parts: string[],
  event: ServiceRequest,
) => Promise<APIGatewayProxyResult | undefined> | APIGatewayProxyResult | undefined;

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

export function json(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function ok(body: unknown): APIGatewayProxyResult {
  return json(200, body);
}

export function badRequest(error: string): APIGatewayProxyResult {
  return json(400, { error });
}

export function notFound(): APIGatewayProxyResult {
  return json(404, { error: 'not found' });
}

function internalError(message: string): APIGatewayProxyResult {
  return json(500, { error: 'INTERNAL_ERROR', message });
}

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------

/** Malformed or non-object bodies read as an empty object. */
export function readBody(event: ServiceRequest): Record<string, unknown> {
  if (!event.body) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(event.body);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return parsed as Record<string, unknown>;
    }
    return {};
  } catch {
    return {};
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function pathParts(path: string): string[] {
  return path.split('/').filter(part => part !== '').map(decodeSegment);
}

// ---------------------------------------------------------------------------
// Service wrapper
// ---------------------------------------------------------------------------

/**
 * Adds the routes every service shares: `GET /health`, a JSON 404 for
 * anything the service route does not answer, and a 500 for thrown errors.
 */
export function createService(service: string, route: Route): ServiceHandler {
  return async (event) => {
    const start = Date.now();
    const method = event.httpMethod.toUpperCase();
    const parts = pathParts(event.path);

    try {
      if (method === 'GET' && parts.length === 1 && parts[0] === 'health') {
        return ok({ status: 'ok', service });
      }
      const result = await route(method, parts, event);
      return result ?? notFound();
    } catch (err) {
      log({
        level: 'error',
        action: `${service}.error`,
        path: event.path,
        error: errorMessage(err),
        durationMs: Date.now() - start,
      });
      return internalError('An unexpected error occurred');
    }
  };
}
