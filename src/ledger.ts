import { InvalidQuantityError } from './errors';
import type { InventoryLedgerPort, ReserveResult, StockEntry } from './types';

function assertPositive(quantity: number): void {
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new InvalidQuantityError('quantity must be > 0');
  }
}

/**
 * In-process stock map owned by the inventory service.
 *
 * Each operation reads and writes the map without yielding to the event loop,
 * so reserve/release/set are linearizable per item.
 */
export class StockLedger implements InventoryLedgerPort {
  private readonly stock = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [item, quantity] of Object.entries(initial)) {
      this.setStock(item, quantity);
    }
  }

  async getStock(item: string): Promise<number> {
    return this.read(item);
  }

  setStock(item: string, quantity: number): void {
    if (!Number.isSafeInteger(quantity) || quantity < 0) {
      throw new InvalidQuantityError('quantity must be >= 0');
    }
    this.stock.set(item, quantity);
  }

  async reserve(item: string, quantity: number): Promise<ReserveResult> {
    assertPositive(quantity);
    const current = this.read(item);
    if (current < quantity) {
      return { ok: false, error: 'insufficient_stock', available: current };
    }
    const remaining = current - quantity;
    this.stock.set(item, remaining);
    return { ok: true, remaining };
  }

  async release(item: string, quantity: number): Promise<number> {
    assertPositive(quantity);
    const next = this.read(item) + quantity;
    if (!Number.isSafeInteger(next)) {
      throw new InvalidQuantityError('stock would exceed the safe integer range');
    }
    this.stock.set(item, next);
    return next;
  }

  snapshot(): StockEntry[] {
    return [...this.stock.entries()].map(([item, stock]) => ({ item, stock }));
  }

  private read(item: string): number {
    return this.stock.get(item) ?? 0;
  }
}
