import type { ResultAsync } from 'neverthrow';
import type { StoreError } from '../seed/errors.js';
import type { Rule } from '../seed/template.js';
import type { ETag, RuleStore } from '../seed/types.js';
import { JsonHttpClient, encodePath, expectSuccess, type HttpClientOptions } from './http.js';

const RESOURCE = 'telemetry';

/**
 * Rules client for the telemetry service.
 */
export class TelemetryClient implements RuleStore {
	private readonly http: JsonHttpClient;

	constructor(options: HttpClientOptions) {
		this.http = new JsonHttpClient(RESOURCE, options);
	}

	upsert(rule: Rule, etag: ETag): ResultAsync<void, StoreError> {
		return this.http
			.put(encodePath('rules', rule.id), { ...rule, ETag: etag })
			.andThen((response) => expectSuccess(`${RESOURCE} rule ${rule.id}`, response))
			.map(() => undefined);
	}
}
