import { createInventoryClient, createPaymentClient } from '../src/clients';
import { CollaboratorUnreachableError } from '../src/errors';

// ---------------------------------------------------------------------------
// fetch stub
// ---------------------------------------------------------------------------

let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

function reply(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

beforeEach(() => {
  fetchMock = jest.spyOn(global, 'fetch');
});

afterEach(() => {
  jest.restoreAllMocks();
});

const inventory = createInventoryClient('http://inventory.test', 1000);
const payment = createPaymentClient('http://payment.test', 1000);

// ---------------------------------------------------------------------------
// Inventory client
// ---------------------------------------------------------------------------

test('getStock reads the stock field and encodes the item in the path', async () => {
  fetchMock.mockResolvedValue(reply(200, { item: 'blue widget', stock: 7 }));

  await expect(inventory.getStock('blue widget')).resolves.toBe(7);
  expect(fetchMock).toHaveBeenCalledWith(
    'http://inventory.test/inventory/blue%20widget',
    expect.objectContaining({ method: 'GET' }),
  );
});

test('getStock treats a non-200 answer as unreachable', async () => {
  fetchMock.mockResolvedValue(reply(500, { error: 'INTERNAL_ERROR' }));

  await expect(inventory.getStock('widget')).rejects.toBeInstanceOf(CollaboratorUnreachableError);
});

test('network errors become CollaboratorUnreachableError', async () => {
  fetchMock.mockRejectedValue(new TypeError('fetch failed'));

  await expect(inventory.getStock('widget')).rejects.toThrow('inventory unreachable: fetch failed');
});

test('a collaborator that never answers is cut off by the timeout', async () => {
  const slow = createInventoryClient('http://inventory.test', 20);
  fetchMock.mockImplementation(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        signal?.addEventListener('abort', () => reject(new Error('The operation was aborted due to timeout')));
      }),
  );

  await expect(slow.getStock('widget')).rejects.toThrow(
    'inventory unreachable: The operation was aborted due to timeout',
  );
});

test('reserve posts the quantity and maps 200 to ok', async () => {
  fetchMock.mockResolvedValue(reply(200, { message: 'reserved', item: 'widget', remaining: 2 }));

  await expect(inventory.reserve('widget', 3)).resolves.toEqual({ ok: true, remaining: 2 });
  expect(fetchMock).toHaveBeenCalledWith(
    'http://inventory.test/inventory/widget/reserve',
    expect.objectContaining({ method: 'POST', body: '{"quantity":3}' }),
  );
});

test('reserve maps 409 insufficient_stock to a rejection', async () => {
  fetchMock.mockResolvedValue(reply(409, { error: 'insufficient_stock', available: 1 }));

  await expect(inventory.reserve('widget', 3)).resolves.toEqual({
    ok: false,
    error: 'insufficient_stock',
    available: 1,
  });
});

test('reserve keeps the response body on unexpected statuses', async () => {
  fetchMock.mockResolvedValue(reply(400, { error: 'quantity must be > 0' }));

  const error: unknown = await inventory.reserve('widget', 3).catch((err: unknown) => err);

  expect(error).toBeInstanceOf(CollaboratorUnreachableError);
  expect(error).toMatchObject({ service: 'inventory', detail: { error: 'quantity must be > 0' } });
});

test('release returns the new stock', async () => {
  fetchMock.mockResolvedValue(reply(200, { message: 'released', item: 'widget', stock: 5 }));

  await expect(inventory.release('widget', 3)).resolves.toBe(5);
  expect(fetchMock).toHaveBeenCalledWith(
    'http://inventory.test/inventory/widget/release',
    expect.objectContaining({ method: 'POST', body: '{"quantity":3}' }),
  );
});

// ---------------------------------------------------------------------------
// Payment client
// ---------------------------------------------------------------------------

test('charge returns the confirmation message on 200', async () => {
  fetchMock.mockResolvedValue(reply(200, { message: 'Processed 30 via Credit Card.' }));

  await expect(payment.charge('credit_card', 30)).resolves.toEqual({
    ok: true,
    message: 'Processed 30 via Credit Card.',
  });
  expect(fetchMock).toHaveBeenCalledWith(
    'http://payment.test/pay',
    expect.objectContaining({ method: 'POST', body: '{"method":"credit_card","amount":30}' }),
  );
});

test('charge reports a decline with the response body as detail', async () => {
  fetchMock.mockResolvedValue(reply(400, { error: 'amount must be > 0' }));

  await expect(payment.charge('credit_card', 30)).resolves.toEqual({
    ok: false,
    detail: { error: 'amount must be > 0' },
  });
});

test('a non-JSON error page reads as http_error', async () => {
  fetchMock.mockResolvedValue(new Response('<html>Bad Gateway</html>', { status: 502 }));

  await expect(payment.charge('credit_card', 30)).resolves.toEqual({
    ok: false,
    detail: { error: 'http_error' },
  });
});
