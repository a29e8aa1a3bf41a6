import type { Logger } from '@solution-seeder/logging';
import { describeStoreError } from '../seed/errors.js';
import type { ETag, FlagStore, MutexService, StoredValue } from '../seed/types.js';

const LOCKED = 'true';
const UNLOCKED = 'false';

/**
 * Mutex kept as a record in the key/value store.
 *
 * A record holding "true" is a lease that lives until its last modification
 * time plus the timeout. Taking the lease is an ETag-conditional write, so of
 * two instances that read the same record only one write lands; the other
 * gets a conflict and backs off.
 */
export class StorageMutex implements MutexService {
	private readonly store: FlagStore;
	private readonly logger: Logger;
	private readonly now: () => number;

	/** ETag of each lease this instance wrote, by `collection/key` */
	private readonly heldLeases = new Map<string, string>();

	constructor(store: FlagStore, logger: Logger, now: () => number = Date.now) {
		this.store = store;
		this.logger = logger.child({ component: 'StorageMutex' });
		this.now = now;
	}

	async acquire(collectionId: string, key: string, timeoutMs: number): Promise<boolean> {
		const current = await this.store.get(collectionId, key);

		let etag: ETag = null;
		if (current.isOk()) {
			if (this.isLive(current.value, timeoutMs)) {
				this.logger.debug(
					{ collectionId, key, modifiedAt: current.value.modifiedAt },
					'Mutex held by another instance',
				);
				return false;
			}
			etag = current.value.etag;
		} else if (current.error.type !== 'not_found') {
			this.logger.warn(
				{ collectionId, key, error: describeStoreError(current.error) },
				'Unable to read mutex record',
			);
			return false;
		}

		const written = await this.store.put(collectionId, key, LOCKED, etag);
		if (written.isErr()) {
			if (written.error.type === 'conflict') {
				this.logger.debug({ collectionId, key }, 'Mutex taken by another instance first');
			} else {
				this.logger.warn(
					{ collectionId, key, error: describeStoreError(written.error) },
					'Unable to write mutex record',
				);
			}
			return false;
		}

		this.heldLeases.set(leaseId(collectionId, key), written.value.etag);
		this.logger.info({ collectionId, key, timeoutMs }, 'Mutex acquired');
		return true;
	}

	async release(collectionId: string, key: string): Promise<boolean> {
		const id = leaseId(collectionId, key);
		const etag = this.heldLeases.get(id);
		if (etag === undefined) {
			this.logger.debug({ collectionId, key }, 'Mutex not held by this instance, nothing to release');
			return false;
		}
		this.heldLeases.delete(id);

		const written = await this.store.put(collectionId, key, UNLOCKED, etag);
		if (written.isErr()) {
			this.logger.warn(
				{ collectionId, key, error: describeStoreError(written.error) },
				'Mutex not released (lease expired or taken over?)',
			);
			return false;
		}

		this.logger.info({ collectionId, key }, 'Mutex released');
		return true;
	}

	/**
	 * A record without a modification time never expires.
	 */
	private isLive(value: StoredValue, timeoutMs: number): boolean {
		if (value.data !== LOCKED) {
			return false;
		}
		if (value.modifiedAt === null) {
			return true;
		}
		return value.modifiedAt.getTime() + timeoutMs > this.now();
	}
}

function leaseId(collectionId: string, key: string): string {
	return `${collectionId}/${key}`;
}
