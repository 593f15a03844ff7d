export const SERVICES = ['cart', 'inventory', 'payment', 'orchestrator'] as const;

export type ServiceName = (typeof SERVICES)[number];

export interface Config {
  service: ServiceName;
  port: number;
  inventoryUrl: string;
  paymentUrl: string;
  timeoutMs: number; // bound on every outbound collaborator call
}

export const DEFAULT_CONFIG: Config = {
  service: 'orchestrator',
  port: 5000,
  inventoryUrl: 'http://127.0.0.1:5001',
  paymentUrl: 'http://127.0.0.1:5002',
  timeoutMs: 5000,
};

export function isServiceName(value: string): value is ServiceName {
  return (SERVICES as readonly string[]).includes(value);
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid environment variable ${name}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const service = env['SERVICE'] ?? DEFAULT_CONFIG.service;
  if (!isServiceName(service)) {
    throw new Error(`Invalid environment variable SERVICE: "${service}"`);
  }

  return {
    service,
    port: readPositiveInt(env, 'PORT', DEFAULT_CONFIG.port),
    inventoryUrl: env['INVENTORY_URL'] || DEFAULT_CONFIG.inventoryUrl,
    paymentUrl: env['PAYMENT_URL'] || DEFAULT_CONFIG.paymentUrl,
    timeoutMs: readPositiveInt(env, 'COLLABORATOR_TIMEOUT_MS', DEFAULT_CONFIG.timeoutMs),
  };
}
