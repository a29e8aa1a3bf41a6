import { ResultAsync } from 'neverthrow';
import { z } from 'zod/v4';
import type { StoreError } from '../seed/errors.js';
import type { ETag, FlagStore, StoredValue } from '../seed/types.js';
import { JsonHttpClient, encodePath, expectSuccess, parseBody, type HttpClientOptions } from './http.js';

const RESOURCE = 'storage-adapter';

/**
 * Value record as returned by the storage adapter
 */
const ValueApiModelSchema = z.object({
	Key: z.string(),
	Data: z.string(),
	ETag: z.string(),
	$metadata: z.record(z.string(), z.string()).optional(),
});

type ValueApiModel = z.infer<typeof ValueApiModelSchema>;

function toStoredValue(model: ValueApiModel): StoredValue {
	const modified = model.$metadata?.['$modified'];
	const modifiedAt = modified === undefined ? null : new Date(modified);
	return {
		key: model.Key,
		data: model.Data,
		etag: model.ETag,
		modifiedAt: modifiedAt === null || Number.isNaN(modifiedAt.getTime()) ? null : modifiedAt,
	};
}

/**
 * Key/value client for the storage adapter service.
 *
 * `GET|PUT /collections/{collectionId}/values/{key}`
 */
export class StorageAdapterClient implements FlagStore {
	private readonly http: JsonHttpClient;

	constructor(options: HttpClientOptions) {
		this.http = new JsonHttpClient(RESOURCE, options);
	}

	get(collectionId: string, key: string): ResultAsync<StoredValue, StoreError> {
		return this.http
			.get(valuePath(collectionId, key))
			.andThen((response) => expectSuccess(`${RESOURCE} ${collectionId}/${key}`, response))
			.andThen((response) => parseBody(RESOURCE, ValueApiModelSchema, response))
			.map(toStoredValue);
	}

	put(collectionId: string, key: string, data: string, etag: ETag): ResultAsync<StoredValue, StoreError> {
		return this.http
			.put(valuePath(collectionId, key), { Data: data, ETag: etag })
			.andThen((response) => expectSuccess(`${RESOURCE} ${collectionId}/${key}`, response))
			.andThen((response) => parseBody(RESOURCE, ValueApiModelSchema, response))
			.map(toStoredValue);
	}
}

function valuePath(collectionId: string, key: string): string {
	return encodePath('collections', collectionId, 'values', key);
}
