import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import { pino, type Logger } from 'pino';
import { StoreErrors, type StoreError, type TemplateError } from '../../seed/errors.js';
import type { Group, Rule, Simulation, Template } from '../../seed/template.js';
import type {
	ETag,
	FlagStore,
	GroupStore,
	RuleStore,
	SimulationStore,
	StoredValue,
	TemplateLoader,
} from '../../seed/types.js';
import type { RedisLockClient } from '../../mutex/redis-mutex.js';
import { RELEASE_SCRIPT } from '../../mutex/redis-mutex.js';

interface Entry {
	data: string;
	etag: string;
	modifiedAt: Date;
}

/**
 * Key/value store with the storage adapter's ETag rules. Writes apply
 * synchronously when `put` is called.
 */
export class InMemoryKeyValueStore implements FlagStore {
	readonly entries = new Map<string, Entry>();
	readonly writes: Array<{ collectionId: string; key: string; data: string; etag: ETag }> = [];
	/** Errors to return instead of touching the entry, by `collection/key` */
	readonly getFailures = new Map<string, StoreError>();
	readonly putFailures = new Map<string, StoreError>();

	private version = 0;

	constructor(private readonly now: () => number = Date.now) {}

	get(collectionId: string, key: string): ResultAsync<StoredValue, StoreError> {
		const id = `${collectionId}/${key}`;
		const failure = this.getFailures.get(id);
		if (failure) {
			return errAsync(failure);
		}
		const entry = this.entries.get(id);
		if (!entry) {
			return errAsync(StoreErrors.notFound(id));
		}
		return okAsync(toValue(key, entry));
	}

	put(collectionId: string, key: string, data: string, etag: ETag): ResultAsync<StoredValue, StoreError> {
		const id = `${collectionId}/${key}`;
		const failure = this.putFailures.get(id);
		if (failure) {
			return errAsync(failure);
		}

		const existing = this.entries.get(id);
		if (etag === null && existing) {
			return errAsync(StoreErrors.conflict(id, 'already exists'));
		}
		if (etag !== null && etag !== '*' && existing?.etag !== etag) {
			return errAsync(StoreErrors.conflict(id, 'etag mismatch'));
		}

		this.version += 1;
		const entry: Entry = { data, etag: `"v${this.version}"`, modifiedAt: new Date(this.now()) };
		this.entries.set(id, entry);
		this.writes.push({ collectionId, key, data, etag });
		return okAsync(toValue(key, entry));
	}

	data(collectionId: string, key: string): string | undefined {
		return this.entries.get(`${collectionId}/${key}`)?.data;
	}
}

function toValue(key: string, entry: Entry): StoredValue {
	return { key, data: entry.data, etag: entry.etag, modifiedAt: entry.modifiedAt };
}

/**
 * Records upserts; optionally fails the n-th call (1-based).
 */
export class RecordingGroupStore implements GroupStore {
	readonly upserts: Array<{ groupId: string; group: Group; etag: ETag }> = [];
	attempts = 0;

	constructor(private readonly failOnAttempt: number | null = null) {}

	upsert(groupId: string, group: Group, etag: ETag): ResultAsync<void, StoreError> {
		this.attempts += 1;
		if (this.attempts === this.failOnAttempt) {
			return errAsync(StoreErrors.httpError('storage-adapter', 500, 'boom'));
		}
		this.upserts.push({ groupId, group, etag });
		return okAsync(undefined);
	}

	ids(): string[] {
		return this.upserts.map((u) => u.groupId);
	}
}

export class RecordingRuleStore implements RuleStore {
	readonly upserts: Array<{ rule: Rule; etag: ETag }> = [];
	attempts = 0;

	constructor(private readonly failOnAttempt: number | null = null) {}

	upsert(rule: Rule, etag: ETag): ResultAsync<void, StoreError> {
		this.attempts += 1;
		if (this.attempts === this.failOnAttempt) {
			return errAsync(StoreErrors.httpError('telemetry', 503, 'unavailable'));
		}
		this.upserts.push({ rule, etag });
		return okAsync(undefined);
	}

	ids(): string[] {
		return this.upserts.map((u) => u.rule.id);
	}
}

/**
 * The first simulation created becomes the default one.
 */
export class InMemorySimulationStore implements SimulationStore {
	readonly created: Simulation[] = [];
	queryError: StoreError | null = null;
	createError: StoreError | null = null;

	constructor(public defaultSimulation: Simulation | null = null) {}

	getDefault(): ResultAsync<Simulation | null, StoreError> {
		if (this.queryError) {
			return errAsync(this.queryError);
		}
		return okAsync(this.defaultSimulation);
	}

	create(simulation: Simulation): ResultAsync<void, StoreError> {
		if (this.createError) {
			return errAsync(this.createError);
		}
		this.created.push(simulation);
		this.defaultSimulation ??= simulation;
		return okAsync(undefined);
	}
}

export class StaticTemplateLoader implements TemplateLoader {
	loads = 0;

	constructor(private readonly outcome: Template | TemplateError) {}

	load(): ResultAsync<Template, TemplateError> {
		this.loads += 1;
		if ('type' in this.outcome) {
			return errAsync(this.outcome);
		}
		return okAsync(this.outcome);
	}
}

/**
 * Enough of Redis for SET NX PX and the release script.
 */
export class FakeRedis implements RedisLockClient {
	readonly values = new Map<string, { value: string; expiresAt: number }>();
	unavailable = false;

	constructor(private readonly now: () => number = Date.now) {}

	async set(key: string, value: string, _token: 'PX', milliseconds: number, _nx: 'NX'): Promise<string | null> {
		this.assertAvailable();
		const current = this.values.get(key);
		if (current && current.expiresAt > this.now()) {
			return null;
		}
		this.values.set(key, { value, expiresAt: this.now() + milliseconds });
		return 'OK';
	}

	async eval(script: string, _numkeys: number, ...args: (string | number)[]): Promise<unknown> {
		this.assertAvailable();
		if (script !== RELEASE_SCRIPT) {
			throw new Error('unsupported script');
		}
		const [key, owner] = args.map(String);
		const current = key === undefined ? undefined : this.values.get(key);
		if (key !== undefined && current && current.expiresAt > this.now() && current.value === owner) {
			this.values.delete(key);
			return 1;
		}
		return 0;
	}

	private assertAvailable(): void {
		if (this.unavailable) {
			throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
		}
	}
}

/**
 * Logger that keeps every line it writes, parsed, for assertions on what was logged.
 */
export function captureLogs(): { logger: Logger; entries: Record<string, unknown>[] } {
	const entries: Record<string, unknown>[] = [];
	const logger = pino(
		{ level: 'trace' },
		{
			write(line: string) {
				const parsed: unknown = JSON.parse(line);
				if (typeof parsed === 'object' && parsed !== null) {
					entries.push({ ...parsed });
				}
			},
		},
	);
	return { logger, entries };
}
