import 'dotenv/config';
import { startREPL } from './cli/repl';
import { logger } from './infra/logger';

async function main() {
  logger.info('Starting BTO portal...');

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down...');
    process.exit(0);
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await startREPL();
  logger.info('Session ended');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start portal');
  process.exit(1);
});
