import express, { type Request, type Response, type NextFunction } from 'express';
import { CartStore } from './cart';
import { createInventoryClient, createPaymentClient } from './clients';
import { DEFAULT_CONFIG, isServiceName, loadConfig, type Config } from './config';
import { createCartHandler } from './handlers/cart';
import { createInventoryHandler } from './handlers/inventory';
import { createOrchestratorHandler } from './handlers/orchestrator';
import { createPaymentHandler } from './handlers/payment';
import type { ServiceHandler, ServiceRequest } from './http';
import { StockLedger } from './ledger';
import { log } from './logger';
import { PaymentGateway } from './payment';

// ---------------------------------------------------------------------------
// CLI flags
// ---------------------------------------------------------------------------

function parsePort(flag: string, value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`${flag} expects a port number, got "${value}"`);
  }
  return port;
}

/**
 * Applies `--service`, `--port`, `--inventory <port>` and `--payment <port>`
 * on top of `base`. Unknown arguments are ignored.
 */
export function parseArgs(args: string[], base: Config = DEFAULT_CONFIG): Config {
  const config: Config = { ...base };

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (value === undefined) {
      break;
    }
    switch (flag) {
      case '--service':
        if (!isServiceName(value)) {
          throw new Error(`--service expects one of cart, inventory, payment, orchestrator, got "${value}"`);
        }
        config.service = value;
        break;
      case '--port':
        config.port = parsePort(flag, value);
        break;
      case '--inventory':
        config.inventoryUrl = `http://127.0.0.1:${parsePort(flag, value)}`;
        break;
      case '--payment':
        config.paymentUrl = `http://127.0.0.1:${parsePort(flag, value)}`;
        break;
      default:
        continue;
    }
    i++;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export function buildHandler(config: Config): ServiceHandler {
  switch (config.service) {
    case 'cart':
      return createCartHandler(new CartStore());
    case 'inventory':
      return createInventoryHandler(new StockLedger());
    case 'payment':
      return createPaymentHandler(new PaymentGateway());
    case 'orchestrator':
      return createOrchestratorHandler({
        inventory: createInventoryClient(config.inventoryUrl, config.timeoutMs),
        payment: createPaymentClient(config.paymentUrl, config.timeoutMs),
      });
  }
}

function toServiceRequest(req: Request): ServiceRequest {
  const body: unknown = req.body;
  return {
    httpMethod: req.method,
    path: req.path,
    body: typeof body === 'string' && body !== '' ? body : null,
  };
}

/** Serves a Lambda-style handler over plain HTTP. */
export function createApp(handler: ServiceHandler): express.Express {
  const app = express();
  app.use(express.text({ type: () => true }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    handler(toServiceRequest(req))
      .then(result => {
        res.status(result.statusCode).set(result.headers ?? {}).send(result.body);
      })
      .catch(next);
  });
  return app;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function main(argv: string[]): void {
  const config = parseArgs(argv, loadConfig());
  const app = createApp(buildHandler(config));

  app.listen(config.port, '0.0.0.0', () => {
    log({ level: 'info', action: 'service.listening', service: config.service, port: config.port });
    if (config.service === 'orchestrator') {
      log({
        level: 'info',
        action: 'service.collaborators',
        inventoryUrl: config.inventoryUrl,
        paymentUrl: config.paymentUrl,
        timeoutMs: config.timeoutMs,
      });
    }
  });
}

if (require.main === module) {
  main(process.argv.slice(2));
}
