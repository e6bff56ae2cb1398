import { createApp } from './app.js';
import { createPool } from './db/pool.js';
import { loadConfig } from './lib/config.js';
import { logger } from './lib/logger.js';
import { createPgStore } from './repositories/pg-store.js';
import { createServices } from './services/index.js';
import { createDemoGateway, type PaymentGateway } from './services/payment-gateway.js';
import { createStripeGateway } from './services/stripe-gateway.js';

const config = loadConfig();
const pool = createPool(config.DATABASE_URL);

let gateway: PaymentGateway;
if (config.paymentsConfigured) {
  gateway = createStripeGateway({
    secretKey: config.STRIPE_SECRET_KEY,
    timeoutMs: config.PAYMENT_TIMEOUT_MS,
    statementDescriptor: config.STATEMENT_DESCRIPTOR,
  });
} else {
  // loadConfig refuses this combination in production
  logger.warn('Payments running in DEMO mode. Set STRIPE_SECRET_KEY and STRIPE_WEBHOOK_SECRET for real charges.');
  gateway = createDemoGateway();
}

const services = createServices({ store: createPgStore(pool), gateway, config });

const app = createApp(services, {
  config,
  healthCheck: async () => {
    await pool.query('SELECT 1');
  },
});

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, env: config.NODE_ENV }, 'ParkaLot API listening');
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down...');
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Error closing database pool');
        process.exit(1);
      });
  });
}
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
