import { loadEnv } from './config/env';
loadEnv();

import { logger } from './config/logger';
import { closeRedis, watchCompositionQueue } from './config/redis';
import createCompositionWorker from './jobs/composition.worker';
import { errorMessage } from './utils/errors';

// Start the queue worker
const startWorker = async () => {
  const { worker, runtime } = await createCompositionWorker();
  watchCompositionQueue();

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received; draining composition worker`);
    await worker.close();
    await runtime.close();
    await closeRedis();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }
};

startWorker().catch((error: unknown) => {
  logger.error(`Failed to start worker: ${errorMessage(error)}`);
  process.exit(1);
});

// Handle unhandled rejections
process.on('unhandledRejection', (err: unknown) => {
  logger.error(`Unhandled Rejection: ${errorMessage(err)}`);
  process.exit(1);
});
