import type { Logger } from '@solution-seeder/logging';
import type { FlagStore, MutexService } from '../seed/types.js';
import { RedisMutex } from './redis-mutex.js';
import { StorageMutex } from './storage-mutex.js';

export { RedisMutex, RELEASE_SCRIPT, type RedisLockClient } from './redis-mutex.js';
export { StorageMutex } from './storage-mutex.js';

export interface MutexConfig {
	backend: 'storage' | 'redis';
	instanceId: string;
	/** Redis URL (e.g., "redis://localhost:6379") */
	redisUrl?: string | undefined;
}

export interface MutexHandle {
	mutex: MutexService;
	/** Close any connection the backend opened */
	close(): Promise<void>;
}

/**
 * Create the seed mutex from configuration.
 *
 * The storage backend shares the key/value store with the completion flag.
 * The redis backend opens its own connection; if it cannot connect, every
 * acquire reports contention and the seed is skipped.
 */
export async function createMutex(config: MutexConfig, store: FlagStore, logger: Logger): Promise<MutexHandle> {
	if (config.backend === 'storage') {
		return { mutex: new StorageMutex(store, logger), close: async () => {} };
	}

	if (!config.redisUrl) {
		logger.warn('Redis mutex selected but no REDIS_URL configured - falling back to storage mutex');
		return { mutex: new StorageMutex(store, logger), close: async () => {} };
	}

	// Dynamic import ioredis to avoid loading it when not needed
	const { Redis } = await import('ioredis');

	const redis = new Redis(config.redisUrl, {
		maxRetriesPerRequest: 3,
		retryStrategy(times: number) {
			// Exponential backoff: 200ms, 400ms, 800ms, then cap at 5s
			return Math.min(times * 200, 5000);
		},
		lazyConnect: true,
	});

	try {
		await redis.connect();
		logger.info({ redisUrl: config.redisUrl }, 'Redis connected for seed mutex');
	} catch (error) {
		logger.error({ err: error, redisUrl: config.redisUrl }, 'Failed to connect to Redis for seed mutex');
	}

	return {
		mutex: new RedisMutex(redis, config.instanceId, logger),
		close: async () => {
			redis.disconnect();
		},
	};
}
