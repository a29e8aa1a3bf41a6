import type { Logger } from '@solution-seeder/logging';
import type { MutexService } from '../seed/types.js';

/**
 * Lua script: Atomically release lock only if we own it.
 * Returns 1 if deleted, 0 if we don't own the lock.
 *
 * KEYS[1] = lock key
 * ARGV[1] = our instance ID
 */
export const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
else
    return 0
end
`;

/**
 * The Redis commands the mutex needs. An ioredis `Redis` client satisfies it.
 */
export interface RedisLockClient {
	set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number, nx: 'NX'): Promise<string | null>;
	eval(script: string, numkeys: number, ...args: (string | number)[]): Promise<unknown>;
}

/**
 * Redis lease lock.
 *
 * - SET NX PX for atomic acquisition; the TTL is the lease timeout
 * - Lua compare-and-delete for release, so an expired holder cannot free
 *   a lease another instance has since taken
 */
export class RedisMutex implements MutexService {
	private readonly redis: RedisLockClient;
	private readonly instanceId: string;
	private readonly logger: Logger;

	constructor(redis: RedisLockClient, instanceId: string, logger: Logger) {
		this.redis = redis;
		this.instanceId = instanceId;
		this.logger = logger.child({ component: 'RedisMutex' });
	}

	async acquire(collectionId: string, key: string, timeoutMs: number): Promise<boolean> {
		const lockKey = redisKey(collectionId, key);

		try {
			const result = await this.redis.set(lockKey, this.instanceId, 'PX', timeoutMs, 'NX');

			if (result === 'OK') {
				this.logger.info({ lockKey, instanceId: this.instanceId, timeoutMs }, 'Lock acquired');
				return true;
			}

			this.logger.debug({ lockKey }, 'Lock held by another instance');
			return false;
		} catch (error) {
			this.logger.warn({ err: error, lockKey }, 'Redis unavailable - unable to acquire lock');
			return false;
		}
	}

	async release(collectionId: string, key: string): Promise<boolean> {
		const lockKey = redisKey(collectionId, key);

		try {
			const result = await this.redis.eval(RELEASE_SCRIPT, 1, lockKey, this.instanceId);

			if (result === 1) {
				this.logger.info({ lockKey, instanceId: this.instanceId }, 'Lock released');
				return true;
			}

			this.logger.warn({ lockKey }, 'Lock was not held by this instance (already expired?)');
			return false;
		} catch (error) {
			this.logger.warn({ err: error, lockKey }, 'Error releasing lock (will expire automatically)');
			return false;
		}
	}
}

function redisKey(collectionId: string, key: string): string {
	return `${collectionId}:${key}`;
}
