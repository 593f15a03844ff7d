import { createService, badRequest, ok, readBody, type ServiceHandler } from '../http';
import { log } from '../logger';
import type { PaymentGateway } from '../payment';
import { parseAmount } from '../validation';

function declineMessage(detail: unknown): string {
  if (detail !== null && typeof detail === 'object' && 'error' in detail && typeof detail.error === 'string') {
    return detail.error;
  }
  return 'payment declined';
}

export function createPaymentHandler(gateway: PaymentGateway): ServiceHandler {
  return createService('payment', async (method, parts, event) => {
    if (method === 'GET' && parts.length === 1 && parts[0] === 'methods') {
      return ok({ methods: gateway.methods() });
    }
    if (method !== 'POST' || parts.length !== 1 || parts[0] !== 'pay') {
      return undefined;
    }

    const body = readBody(event);
    const amount = parseAmount(body['amount']);
    if (!amount.ok) {
      return badRequest(amount.message);
    }
    const paymentMethod = typeof body['method'] === 'string' ? body['method'] : '';

    const result = await gateway.charge(paymentMethod, amount.value);
    if (!result.ok) {
      log({ level: 'warn', action: 'payment.declined', method: paymentMethod, amount: amount.value });
      return badRequest(declineMessage(result.detail));
    }
    log({ level: 'info', action: 'payment.capture', method: paymentMethod, amount: amount.value });
    return ok({ message: result.message });
  });
}
