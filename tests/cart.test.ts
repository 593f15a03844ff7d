import { CartStore } from '../src/cart';
import { InvalidQuantityError } from '../src/errors';

test('add accumulates quantities per item', () => {
  const carts = new CartStore();

  carts.add('alice', 'widget', 2);
  const cart = carts.add('alice', 'widget', 3);

  expect(cart).toEqual({ widget: 5 });
});

test('get returns an empty cart for unknown users and a copy otherwise', () => {
  const carts = new CartStore();
  expect(carts.get('nobody')).toEqual({});

  carts.add('alice', 'widget', 1);
  const copy = carts.get('alice');
  copy['widget'] = 99;

  expect(carts.get('alice')).toEqual({ widget: 1 });
});

test('add rejects non-positive quantities', () => {
  const carts = new CartStore();

  expect(() => carts.add('alice', 'widget', 0)).toThrow(InvalidQuantityError);
});

test('merge moves the source lines into the target and drops the source', () => {
  const carts = new CartStore();
  carts.add('guest', 'widget', 2);
  carts.add('guest', 'gadget', 1);
  carts.add('alice', 'widget', 1);

  expect(carts.merge('guest', 'alice')).toEqual({ widget: 3, gadget: 1 });
  expect(carts.get('guest')).toEqual({});
});

test('merge returns null when the source has no cart', () => {
  const carts = new CartStore();
  carts.add('alice', 'widget', 1);

  expect(carts.merge('guest', 'alice')).toBeNull();
  expect(carts.merge('alice', 'alice')).toBeNull();
});
