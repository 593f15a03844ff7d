export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

function toNumber(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return raw;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    return Number(raw);
  }
  return undefined;
}

/** Accepts integers and integer strings ("3"); rejects fractions. */
export function parseQuantity(raw: unknown, { allowZero = false } = {}): Parsed<number> {
  const value = toNumber(raw);
  if (value === undefined || !Number.isSafeInteger(value)) {
    return { ok: false, message: 'quantity must be an integer' };
  }
  if (allowZero ? value < 0 : value <= 0) {
    return { ok: false, message: allowZero ? 'quantity must be >= 0' : 'quantity must be > 0' };
  }
  return { ok: true, value };
}

export function parseAmount(raw: unknown): Parsed<number> {
  const value = toNumber(raw);
  if (value === undefined || !Number.isFinite(value)) {
    return { ok: false, message: 'amount must be numeric' };
  }
  if (value <= 0) {
    return { ok: false, message: 'amount must be > 0' };
  }
  return { ok: true, value };
}

export function isNonEmptyString(raw: unknown): raw is string {
  return typeof raw === 'string' && raw.trim() !== '';
}
