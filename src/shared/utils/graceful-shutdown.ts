import { INestApplicationContext, Logger } from '@nestjs/common';
import { errorMessage } from '../lib/util';

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function setupGracefulShutdown(app: INestApplicationContext) {
  const logger = new Logger('GracefulShutdown');
  let closing = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;

    logger.log(`${signal} received: closing application...`);
    try {
      await app.close();
      logger.log('Application closed gracefully.');
      process.exit(0);
    } catch (err) {
      logger.error(`Error during graceful shutdown: ${errorMessage(err)}`);
      process.exit(1);
    }
  };

  for (const signal of SIGNALS) {
    process.on(signal, (received: NodeJS.Signals) => {
      void shutdown(received);
    });
  }
}
