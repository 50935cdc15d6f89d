/**
 * Custom-workflow worker entry point.
 * Loads environment, builds the Fastify app (which starts the BullMQ worker),
 * and serves diagnostics. Handles SIGINT/SIGTERM for graceful shutdown.
 */
import 'dotenv/config';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { getConfig } from './config/index.js';
import { createLogger } from './lib/logger.js';

async function main(): Promise<void> {
  let app: FastifyInstance | undefined;

  try {
    // Fails fast if config is invalid
    const config = getConfig();
    app = await buildApp();

    const appInstance = app;
    const shutdown = async (signal: string): Promise<void> => {
      appInstance.log.info({ signal }, 'Received shutdown signal; draining jobs...');
      try {
        await appInstance.close();
        appInstance.log.info('Worker closed gracefully');
        process.exit(0);
      } catch (err) {
        appInstance.log.error({ err }, 'Error during graceful shutdown');
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));

    await app.listen({ port: config.FLOWQA_PORT, host: config.FLOWQA_HOST });
    app.log.info({ port: config.FLOWQA_PORT, env: config.FLOWQA_NODE_ENV }, 'flowqa worker started');
  } catch (err) {
    const log = app?.log ?? createLogger({ FLOWQA_NODE_ENV: 'production', FLOWQA_LOG_LEVEL: 'error' });
    log.error({ err }, 'Fatal startup error');
    process.exit(1);
  }
}

void main();
