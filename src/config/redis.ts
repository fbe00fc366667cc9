import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import type { CompositionJobOutcome, CompositionJobSpec } from '../types/job.types';
import { logger } from './logger';

// Queue names
export const QUEUE_NAMES = {
  CLIP_COMPOSITION: 'clip-composition',
} as const;

let redisConnection: Redis | undefined;
let compositionQueue: Queue<CompositionJobSpec, CompositionJobOutcome> | undefined;
let compositionQueueEvents: QueueEvents | undefined;

/**
 * Shared Redis connection, opened on first use so that importing the
 * composer never dials Redis.
 */
export function getRedisConnection(url = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
  if (!redisConnection) {
    redisConnection = new Redis(url, {
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
    });

    redisConnection.on('connect', () => {
      logger.info('Redis connected successfully');
    });

    redisConnection.on('error', (error) => {
      logger.error('Redis connection error: %s', error.message);
    });
  }
  return redisConnection;
}

export function getCompositionQueue(): Queue<CompositionJobSpec, CompositionJobOutcome> {
  if (!compositionQueue) {
    compositionQueue = new Queue<CompositionJobSpec, CompositionJobOutcome>(QUEUE_NAMES.CLIP_COMPOSITION, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        // One retry covers a worker restart mid-render
        attempts: 2,
        backoff: {
          type: 'exponential',
          delay: 5000,
        },
        removeOnComplete: {
          count: 100, // Keep last 100 completed jobs
          age: 24 * 3600, // Keep for 24 hours
        },
        removeOnFail: {
          count: 200, // Keep last 200 failed jobs
        },
      },
    });
  }
  return compositionQueue;
}

/** Queue events for monitoring */
export function watchCompositionQueue(): QueueEvents {
  if (!compositionQueueEvents) {
    const queueName = QUEUE_NAMES.CLIP_COMPOSITION;
    compositionQueueEvents = new QueueEvents(queueName, { connection: getRedisConnection() });

    compositionQueueEvents.on('completed', ({ jobId }) => {
      logger.info(`Job ${jobId} in queue ${queueName} completed`);
    });

    compositionQueueEvents.on('failed', ({ jobId, failedReason }) => {
      logger.error(`Job ${jobId} in queue ${queueName} failed: ${failedReason}`);
    });

    compositionQueueEvents.on('progress', ({ jobId, data }) => {
      logger.debug(`Job ${jobId} in queue ${queueName} progress`, { data });
    });
  }
  return compositionQueueEvents;
}

/** Close whatever was opened. */
export async function closeRedis(): Promise<void> {
  await compositionQueueEvents?.close();
  await compositionQueue?.close();
  if (redisConnection) {
    await redisConnection.quit();
  }
  compositionQueueEvents = undefined;
  compositionQueue = undefined;
  redisConnection = undefined;
}
