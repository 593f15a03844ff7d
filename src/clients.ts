import { CollaboratorUnreachableError, errorMessage } from './errors';
import type { ChargeResult, InventoryLedgerPort, PaymentGatewayPort, ReserveResult } from './types';

type JsonObject = Record<string, unknown>;

interface JsonResponse {
  status: number;
  body: JsonObject;
}

function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function send(
  service: string,
  url: string,
  timeoutMs: number,
  init: { method: 'GET' | 'POST'; payload?: JsonObject },
): Promise<JsonResponse> {
  const request: RequestInit = { method: init.method, signal: AbortSignal.timeout(timeoutMs) };
  if (init.payload) {
    request.headers = { 'Content-Type': 'application/json' };
    request.body = JSON.stringify(init.payload);
  }

  let res: Response;
  try {
    res = await fetch(url, request);
  } catch (err) {
    // network failure or timeout abort
    throw new CollaboratorUnreachableError(service, errorMessage(err));
  }

  let body: JsonObject = { error: 'http_error' };
  try {
    const parsed: unknown = await res.json();
    if (isJsonObject(parsed)) {
      body = parsed;
    }
  } catch {
    // non-JSON error pages keep the placeholder body
  }
  return { status: res.status, body };
}

function toCount(value: unknown): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function itemUrl(baseUrl: string, item: string, action?: string): string {
  const path = `${baseUrl}/inventory/${encodeURIComponent(item)}`;
  return action ? `${path}/${action}` : path;
}

export function createInventoryClient(baseUrl: string, timeoutMs: number): InventoryLedgerPort {
  return {
    async getStock(item) {
      const res = await send('inventory', itemUrl(baseUrl, item), timeoutMs, { method: 'GET' });
      if (res.status !== 200) {
        throw new CollaboratorUnreachableError('inventory', `status ${res.status}`, res.body);
      }
      return toCount(res.body['stock']);
    },

    async reserve(item, quantity): Promise<ReserveResult> {
      const res = await send('inventory', itemUrl(baseUrl, item, 'reserve'), timeoutMs, {
        method: 'POST',
        payload: { quantity },
      });
      if (res.status === 200) {
        return { ok: true, remaining: toCount(res.body['remaining']) };
      }
      if (res.status === 409 && res.body['error'] === 'insufficient_stock') {
        return { ok: false, error: 'insufficient_stock', available: toCount(res.body['available']) };
      }
      throw new CollaboratorUnreachableError('inventory', `status ${res.status}`, res.body);
    },

    async release(item, quantity) {
      const res = await send('inventory', itemUrl(baseUrl, item, 'release'), timeoutMs, {
        method: 'POST',
        payload: { quantity },
      });
      if (res.status !== 200) {
        throw new CollaboratorUnreachableError('inventory', `status ${res.status}`, res.body);
      }
      return toCount(res.body['stock']);
    },
  };
}

export function createPaymentClient(baseUrl: string, timeoutMs: number): PaymentGatewayPort {
  return {
    async charge(method, amount): Promise<ChargeResult> {
      const res = await send('payment', `${baseUrl}/pay`, timeoutMs, {
        method: 'POST',
        payload: { method, amount },
      });
      if (res.status === 200 && typeof res.body['message'] === 'string') {
        return { ok: true, message: res.body['message'] };
      }
      return { ok: false, detail: res.body };
    },
  };
}
