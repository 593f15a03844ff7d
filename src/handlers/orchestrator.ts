import type { APIGatewayProxyResult } from 'aws-lambda';
import { createService, badRequest, json, ok, readBody, type ServiceHandler } from '../http';
import { runCheckout, type CheckoutDeps } from '../saga';
import type { CheckoutOutcome } from '../types';

export function toResponse(outcome: CheckoutOutcome): APIGatewayProxyResult {
  if (outcome.status === 'success') {
    return ok({ message: outcome.message });
  }
  switch (outcome.reason) {
    case 'invalid_request':
      return badRequest(outcome.detail);
    case 'insufficient_stock':
      return json(409, { error: 'insufficient_stock', available: outcome.available });
    case 'inventory_unreachable':
      return json(503, { error: 'inventory_unreachable' });
    case 'inventory_reserve_failed':
      return json(409, { error: 'inventory_reserve_failed', details: outcome.detail });
    case 'payment_failed':
      return json(402, { error: 'payment_failed', details: outcome.detail });
  }
}

export function createOrchestratorHandler(deps: CheckoutDeps): ServiceHandler {
  return createService('orchestrator', async (method, parts, event) => {
    if (method !== 'POST' || parts.length !== 1 || parts[0] !== 'checkout') {
      return undefined;
    }
    return toResponse(await runCheckout(readBody(event), deps));
  });
}
