import type { ResultAsync } from 'neverthrow';
import type { StoreError } from '../seed/errors.js';
import type { Group } from '../seed/template.js';
import type { ETag, FlagStore, GroupStore } from '../seed/types.js';

export const DEVICE_GROUP_COLLECTION_ID = 'devicegroups';

/**
 * Device groups live in the key/value store, one JSON document per group id.
 */
export class DeviceGroupStore implements GroupStore {
	private readonly store: FlagStore;

	constructor(store: FlagStore) {
		this.store = store;
	}

	upsert(groupId: string, group: Group, etag: ETag): ResultAsync<void, StoreError> {
		return this.store.put(DEVICE_GROUP_COLLECTION_ID, groupId, JSON.stringify(group), etag).map(() => undefined);
	}
}
