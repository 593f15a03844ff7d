import type { ChargeResult, PaymentGatewayPort } from './types';

// ---------------------------------------------------------------------------
// Message formatting
// ---------------------------------------------------------------------------

/** 30 → "30", 12.5 → "12.5" */
export function formatAmount(amount: number): string {
  return Number.isInteger(amount) ? amount.toFixed(0) : String(amount);
}

/** "credit_card" → "Credit Card"; missing or blank → "Unknown" */
export function prettyMethod(method: unknown): string {
  if (typeof method !== 'string' || method.trim() === '') {
    return 'Unknown';
  }
  return method
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export function confirmationMessage(method: string, amount: number): string {
  return `Processed ${formatAmount(amount)} via ${prettyMethod(method)}.`;
}

// ---------------------------------------------------------------------------
// Processor registry
// ---------------------------------------------------------------------------

export type ChargeFn = (method: string, amount: number) => Promise<ChargeResult>;

export const acceptingProcessor: ChargeFn = async (method, amount) => ({
  ok: true,
  message: confirmationMessage(method, amount),
});

export class ProcessorRegistry {
  private readonly processors = new Map<string, ChargeFn>();

  register(method: string, processor: ChargeFn): this {
    this.processors.set(method, processor);
    return this;
  }

  resolve(method: string): ChargeFn | undefined {
    return this.processors.get(method);
  }

  methods(): string[] {
    return [...this.processors.keys()];
  }
}

export function defaultRegistry(): ProcessorRegistry {
  return new ProcessorRegistry()
    .register('credit_card', acceptingProcessor)
    .register('paypal', acceptingProcessor);
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export interface PaymentGatewayOptions {
  registry?: ProcessorRegistry;
  /** When false, methods missing from the registry go through `fallback`. */
  rejectUnknownMethods?: boolean;
  fallback?: ChargeFn;
}

export class PaymentGateway implements PaymentGatewayPort {
  private readonly registry: ProcessorRegistry;
  private readonly rejectUnknownMethods: boolean;
  private readonly fallback: ChargeFn;

  constructor(options: PaymentGatewayOptions = {}) {
    this.registry = options.registry ?? defaultRegistry();
    this.rejectUnknownMethods = options.rejectUnknownMethods ?? false;
    this.fallback = options.fallback ?? acceptingProcessor;
  }

  methods(): string[] {
    return this.registry.methods();
  }

  async charge(method: string, amount: number): Promise<ChargeResult> {
    if (!Number.isFinite(amount)) {
      return { ok: false, detail: { error: 'amount must be numeric' } };
    }
    if (amount <= 0) {
      return { ok: false, detail: { error: 'amount must be > 0' } };
    }

    const processor = this.registry.resolve(method);
    if (processor) {
      return processor(method, amount);
    }
    if (this.rejectUnknownMethods) {
      return { ok: false, detail: { error: 'Unsupported payment method.' } };
    }
    return this.fallback(method, amount);
  }
}
