import { createService, badRequest, json, ok, readBody, type ServiceHandler } from '../http';
import type { CartStore } from '../cart';
import { isNonEmptyString, parseQuantity } from '../validation';

export function createCartHandler(carts: CartStore): ServiceHandler {
  return createService('cart', async (method, parts, event) => {
    const user = parts[1];
    if (parts[0] !== 'cart' || user === undefined) {
      return undefined;
    }

    if (parts.length === 2 && method === 'GET') {
      return ok({ user, cart: carts.get(user) });
    }
    if (parts.length !== 3 || method !== 'POST') {
      return undefined;
    }

    const body = readBody(event);
    if (parts[2] === 'add') {
      const item = body['item'];
      const quantity = parseQuantity(body['quantity'] ?? 0);
      if (!isNonEmptyString(item) || !quantity.ok) {
        return badRequest('item and positive quantity required');
      }
      return ok({ message: 'added', user, cart: carts.add(user, item, quantity.value) });
    }
    if (parts[2] === 'merge') {
      const source = body['from'];
      if (!isNonEmptyString(source)) {
        return badRequest('from is required');
      }
      const cart = carts.merge(source, user);
      if (!cart) {
        return json(404, { error: 'source cart not found' });
      }
      return ok({ message: 'merged', user, cart });
    }
    return undefined;
  });
}
