import { buildApp } from './app';
import { config } from './config/env';
import { initSentry } from './config/sentry';
import db from './infrastructure/db';
import { productRepository } from './repositories/productRepository';

// Initialize Sentry before anything else
initSentry();

const start = async () => {
  const app = buildApp();

  let isShuttingDown = false;
  const handleShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    app.log.info({ signal }, 'server.shutdown.started');
    try {
      await app.close();
      await db.close();
      app.log.info({ signal }, 'server.shutdown.completed');
      process.exit(0);
    } catch (err) {
      app.log.error(err, 'server.shutdown.failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));

  try {
    await productRepository.ensureSchema();
    await app.listen({ port: config.PORT, host: '0.0.0.0' });
  } catch (err) {
    app.log.error(err);
    await db.close();
    process.exit(1);
  }
};

void start();
