import type { ResultAsync } from 'neverthrow';
import type { StoreError, TemplateError } from './errors.js';
import type { Group, Rule, Simulation, Template } from './template.js';

/** Collection holding both the seed mutex and the completion flag */
export const SEED_COLLECTION_ID = 'solution-settings';
export const MUTEX_KEY = 'seedMutex';
export const COMPLETED_FLAG_KEY = 'seedCompleted';

/** Lease lifetime of the seed mutex */
export const MUTEX_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Version precondition for conditional writes:
 * - `'*'` overwrites whatever is stored
 * - `null` only creates, failing with a conflict if the key exists
 * - any other value must equal the stored ETag
 */
export type ETag = string | null;

export const ANY_ETAG = '*';

/**
 * A value read from or written to the key/value store
 */
export interface StoredValue {
	key: string;
	data: string;
	etag: string;
	/** Last modification time, used for lease expiry */
	modifiedAt: Date | null;
}

/**
 * Distributed lock with a bounded lease.
 *
 * `acquire` resolves `false` both when another holder owns a live lease
 * and when the backend cannot be reached.
 */
export interface MutexService {
	acquire(collectionId: string, key: string, timeoutMs: number): Promise<boolean>;
	release(collectionId: string, key: string): Promise<boolean>;
}

/**
 * Key/value store with optimistic writes. Absence is a `not_found` error.
 */
export interface FlagStore {
	get(collectionId: string, key: string): ResultAsync<StoredValue, StoreError>;
	put(collectionId: string, key: string, data: string, etag: ETag): ResultAsync<StoredValue, StoreError>;
}

export interface GroupStore {
	upsert(groupId: string, group: Group, etag: ETag): ResultAsync<void, StoreError>;
}

export interface RuleStore {
	upsert(rule: Rule, etag: ETag): ResultAsync<void, StoreError>;
}

export interface SimulationStore {
	/** The default simulation, or `null` if none has been created */
	getDefault(): ResultAsync<Simulation | null, StoreError>;
	create(simulation: Simulation): ResultAsync<void, StoreError>;
}

export interface TemplateLoader {
	load(templateName: string): ResultAsync<Template, TemplateError>;
}

export type SkipReason = 'not_configured' | 'mutex_contended' | 'already_completed';

/**
 * Result of a seed attempt that did not fail
 */
export type SeedOutcome = { status: 'completed' } | { status: 'skipped'; reason: SkipReason };
