import { InvalidQuantityError } from './errors';
import type { Cart } from './types';

export class CartStore {
  private readonly carts = new Map<string, Map<string, number>>();

  add(user: string, item: string, quantity: number): Cart {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw new InvalidQuantityError('quantity must be > 0');
    }
    let cart = this.carts.get(user);
    if (!cart) {
      cart = new Map();
      this.carts.set(user, cart);
    }
    cart.set(item, (cart.get(item) ?? 0) + quantity);
    return this.get(user);
  }

  get(user: string): Cart {
    return Object.fromEntries(this.carts.get(user) ?? []);
  }

  /**
   * Moves every line of `source` into `target` and drops `source`.
   * Returns null when `source` has no cart.
   */
  merge(source: string, target: string): Cart | null {
    const from = this.carts.get(source);
    if (!from || source === target) {
      return null;
    }
    for (const [item, quantity] of from) {
      this.add(target, item, quantity);
    }
    this.carts.delete(source);
    return this.get(target);
  }
}
