import { InvalidQuantityError } from '../errors';
import { createService, badRequest, json, ok, readBody, type ServiceHandler } from '../http';
import { log } from '../logger';
import type { StockLedger } from '../ledger';
import { parseQuantity } from '../validation';

export function createInventoryHandler(ledger: StockLedger): ServiceHandler {
  return createService('inventory', async (method, parts, event) => {
    if (parts[0] !== 'inventory') {
      return undefined;
    }
    const item = parts[1];
    if (item === undefined) {
      return method === 'GET' ? ok({ items: ledger.snapshot() }) : undefined;
    }

    if (parts.length === 2) {
      if (method === 'GET') {
        return ok({ item, stock: await ledger.getStock(item) });
      }
      if (method === 'PUT') {
        const quantity = parseQuantity(readBody(event)['quantity'] ?? 0, { allowZero: true });
        if (!quantity.ok) {
          return badRequest(quantity.message);
        }
        ledger.setStock(item, quantity.value);
        log({ level: 'info', action: 'inventory.set', item, stock: quantity.value });
        return ok({ message: `${item} stock updated.` });
      }
      return undefined;
    }

    if (parts.length !== 3 || method !== 'POST') {
      return undefined;
    }
    const action = parts[2];
    if (action !== 'reserve' && action !== 'release') {
      return undefined;
    }

    const quantity = parseQuantity(readBody(event)['quantity']);
    if (!quantity.ok) {
      return badRequest(quantity.message);
    }

    if (action === 'reserve') {
      const result = await ledger.reserve(item, quantity.value);
      if (!result.ok) {
        log({ level: 'warn', action: 'inventory.reserve_rejected', item, available: result.available });
        return json(409, { error: result.error, available: result.available });
      }
      log({ level: 'info', action: 'inventory.reserve', item, remaining: result.remaining });
      return ok({ message: 'reserved', item, remaining: result.remaining });
    }

    let stock: number;
    try {
      stock = await ledger.release(item, quantity.value);
    } catch (err) {
      if (err instanceof InvalidQuantityError) {
        return badRequest(err.message);
      }
      throw err;
    }
    log({ level: 'info', action: 'inventory.release', item, stock });
    return ok({ message: 'released', item, stock });
  });
}
