import { CollaboratorUnreachableError, errorMessage } from './errors';
import { log as defaultLog, type Logger } from './logger';
import type {
  CheckoutOutcome,
  CheckoutRequest,
  InventoryLedgerPort,
  PaymentGatewayPort,
  SagaStep,
} from './types';
import { isNonEmptyString, parseAmount, parseQuantity, type Parsed } from './validation';

export interface CheckoutDeps {
  inventory: InventoryLedgerPort;
  payment: PaymentGatewayPort;
  log?: Logger;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function validateCheckout(body: unknown): Parsed<CheckoutRequest> {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const raw = body as Record<string, unknown>;

  const item = raw['item'];
  if (!isNonEmptyString(item)) {
    return { ok: false, message: 'item and positive quantity required' };
  }
  const quantity = parseQuantity(raw['quantity']);
  if (!quantity.ok) {
    return { ok: false, message: 'item and positive quantity required' };
  }
  const amount = parseAmount(raw['amount']);
  if (!amount.ok) {
    return amount;
  }

  return {
    ok: true,
    value: {
      item,
      quantity: quantity.value,
      amount: amount.value,
      method: typeof raw['method'] === 'string' ? raw['method'] : '',
    },
  };
}

function unreachableDetail(err: unknown): unknown {
  if (err instanceof CollaboratorUnreachableError && err.detail !== undefined) {
    return err.detail;
  }
  return { error: errorMessage(err) };
}

// ---------------------------------------------------------------------------
// Saga
// ---------------------------------------------------------------------------

/**
 * Runs one checkout: check stock, reserve, charge, and release the reservation
 * if the charge fails. Steps run strictly in that order and every failure is
 * terminal; the compensating release is attempted once.
 *
 * The stock check is an early exit only. No lock is held between the check and
 * the reserve, so a concurrent checkout can win the race and this one then
 * fails at the reserve step.
 */
export async function runCheckout(body: unknown, deps: CheckoutDeps): Promise<CheckoutOutcome> {
  const log = deps.log ?? defaultLog;
  const start = Date.now();

  const validation = validateCheckout(body);
  if (!validation.ok) {
    log({ level: 'warn', action: 'checkout.invalid', reason: validation.message });
    return { status: 'failure', reason: 'invalid_request', detail: validation.message };
  }

  const { item, quantity, amount, method } = validation.value;
  const enter = (step: SagaStep): void => {
    log({ level: 'info', action: 'checkout.step', step, item, quantity });
  };
  const finish = (outcome: CheckoutOutcome): CheckoutOutcome => {
    log({
      level: outcome.status === 'success' ? 'info' : 'warn',
      action: 'checkout.complete',
      item,
      outcome: outcome.status === 'success' ? 'success' : outcome.reason,
      durationMs: Date.now() - start,
    });
    return outcome;
  };

  // 1. Check stock
  enter('CheckingStock');
  let stock: number;
  try {
    stock = await deps.inventory.getStock(item);
  } catch (err) {
    log({ level: 'error', action: 'checkout.inventory_unreachable', item, error: errorMessage(err) });
    return finish({ status: 'failure', reason: 'inventory_unreachable', detail: errorMessage(err) });
  }
  if (stock < quantity) {
    return finish({ status: 'failure', reason: 'insufficient_stock', available: stock });
  }

  // 2. Reserve; this is the real availability gate
  enter('Reserving');
  try {
    const reservation = await deps.inventory.reserve(item, quantity);
    if (!reservation.ok) {
      return finish({
        status: 'failure',
        reason: 'inventory_reserve_failed',
        detail: { error: reservation.error, available: reservation.available },
      });
    }
  } catch (err) {
    log({ level: 'error', action: 'checkout.reserve_error', item, error: errorMessage(err) });
    return finish({ status: 'failure', reason: 'inventory_reserve_failed', detail: unreachableDetail(err) });
  }

  // 3. Charge
  enter('Charging');
  let paymentDetail: unknown;
  try {
    const charge = await deps.payment.charge(method, amount);
    if (charge.ok) {
      enter('Done');
      return finish({ status: 'success', message: charge.message });
    }
    paymentDetail = charge.detail;
  } catch (err) {
    paymentDetail = unreachableDetail(err);
  }

  // 4. Compensate; outcome is logged, never surfaced or retried
  enter('Releasing');
  try {
    await deps.inventory.release(item, quantity);
  } catch (err) {
    log({ level: 'error', action: 'checkout.release_failed', item, quantity, error: errorMessage(err) });
  }

  return finish({ status: 'failure', reason: 'payment_failed', detail: paymentDetail });
}
