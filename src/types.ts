export interface StockEntry {
  item: string;
  stock: number; // integer >= 0
}

export interface CheckoutRequest {
  readonly item: string;
  readonly quantity: number; // integer >= 1
  readonly amount: number;   // > 0
  readonly method: string;   // forwarded to the gateway as-is
}

export interface CheckoutSuccess {
  status: 'success';
  message: string;
}

export type CheckoutFailure =
  | { status: 'failure'; reason: 'invalid_request'; detail: string }
  | { status: 'failure'; reason: 'inventory_unreachable'; detail: string }
  | { status: 'failure'; reason: 'insufficient_stock'; available: number }
  | { status: 'failure'; reason: 'inventory_reserve_failed'; detail: unknown }
  | { status: 'failure'; reason: 'payment_failed'; detail: unknown };

export type CheckoutOutcome = CheckoutSuccess | CheckoutFailure;

export type SagaStep = 'CheckingStock' | 'Reserving' | 'Charging' | 'Releasing' | 'Done';

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export type ReserveResult =
  | { ok: true; remaining: number }
  | { ok: false; error: 'insufficient_stock'; available: number };

export interface InventoryLedgerPort {
  getStock(item: string): Promise<number>;
  reserve(item: string, quantity: number): Promise<ReserveResult>;
  release(item: string, quantity: number): Promise<number>;
}

export type ChargeResult =
  | { ok: true; message: string }
  | { ok: false; detail: unknown };

export interface PaymentGatewayPort {
  charge(method: string, amount: number): Promise<ChargeResult>;
}

export type Cart = Record<string, number>;
