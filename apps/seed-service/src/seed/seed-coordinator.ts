import { ResultAsync, err, ok, type Result } from 'neverthrow';
import type { Logger } from '@solution-seeder/logging';
import { SeedErrors, type SeedError } from './errors.js';
import type { SeedRunner } from './seed-runner.js';
import type { SolutionType } from './solution-type.js';
import {
	ANY_ETAG,
	COMPLETED_FLAG_KEY,
	MUTEX_KEY,
	MUTEX_TIMEOUT_MS,
	SEED_COLLECTION_ID,
	type FlagStore,
	type MutexService,
	type SeedOutcome,
	type SkipReason,
} from './types.js';

const skipped = (reason: SkipReason): SeedOutcome => ({ status: 'skipped', reason });
const COMPLETED: SeedOutcome = { status: 'completed' };

export interface SeedCoordinatorConfig {
	/** Template to seed from; empty disables seeding */
	seedTemplate: string | undefined;
	solutionType: SolutionType;
}

export interface SeedCoordinatorDeps {
	config: SeedCoordinatorConfig;
	mutex: MutexService;
	flagStore: FlagStore;
	runner: SeedRunner;
	logger: Logger;
}

/**
 * Runs the seed at most once across every instance sharing the same
 * mutex and completion flag.
 *
 * The mutex is released on every path that acquired it, failures included,
 * so a failed attempt can be retried right away instead of after the lease
 * expires. The completion flag is only written after the seed succeeds.
 */
export class SeedCoordinator {
	private readonly config: SeedCoordinatorConfig;
	private readonly mutex: MutexService;
	private readonly flagStore: FlagStore;
	private readonly runner: SeedRunner;
	private readonly logger: Logger;

	constructor(deps: SeedCoordinatorDeps) {
		this.config = deps.config;
		this.mutex = deps.mutex;
		this.flagStore = deps.flagStore;
		this.runner = deps.runner;
		this.logger = deps.logger.child({ component: 'SeedCoordinator' });
	}

	trySeed(): ResultAsync<SeedOutcome, SeedError> {
		return new ResultAsync(this.seedOnce());
	}

	private async seedOnce(): Promise<Result<SeedOutcome, SeedError>> {
		const templateName = this.config.seedTemplate;
		if (!templateName) {
			this.logger.info('Seed skipped (no template configured)');
			return ok(skipped('not_configured'));
		}

		const acquired = await this.mutex.acquire(SEED_COLLECTION_ID, MUTEX_KEY, MUTEX_TIMEOUT_MS);
		if (!acquired) {
			this.logger.info('Seed skipped (conflict)');
			return ok(skipped('mutex_contended'));
		}

		const result = await this.seedWhileHolding(templateName);

		// Flag is already written at this point on success
		await this.releaseMutex();

		return result;
	}

	private async seedWhileHolding(templateName: string): Promise<Result<SeedOutcome, SeedError>> {
		const completed = await this.isCompleted();
		if (completed.isErr()) {
			return err(completed.error);
		}
		if (completed.value) {
			this.logger.info('Seed skipped (completed)');
			return ok(skipped('already_completed'));
		}

		this.logger.info({ templateName, solutionType: this.config.solutionType }, 'Seed begin');
		const seeded = await this.runner.run(templateName, this.config.solutionType);
		if (seeded.isErr()) {
			return err(seeded.error);
		}
		this.logger.info({ templateName }, 'Seed end');

		const flagged = await this.flagStore.put(SEED_COLLECTION_ID, COMPLETED_FLAG_KEY, 'true', ANY_ETAG);
		if (flagged.isErr()) {
			return err(SeedErrors.completionFlagFailed('write', flagged.error));
		}

		return ok(COMPLETED);
	}

	private async isCompleted(): Promise<Result<boolean, SeedError>> {
		const flag = await this.flagStore.get(SEED_COLLECTION_ID, COMPLETED_FLAG_KEY);
		if (flag.isOk()) {
			return ok(true);
		}
		if (flag.error.type === 'not_found') {
			return ok(false);
		}
		return err(SeedErrors.completionFlagFailed('read', flag.error));
	}

	private async releaseMutex(): Promise<void> {
		const released = await this.mutex.release(SEED_COLLECTION_ID, MUTEX_KEY);
		if (!released) {
			this.logger.warn({ key: MUTEX_KEY }, 'Seed mutex not released, it will expire on its own');
		}
	}
}
