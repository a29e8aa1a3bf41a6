/**
 * @solution-seeder/seed-service
 *
 * Exactly-once seeding of default device groups, rules and simulations:
 * - SeedCoordinator: mutex + completion flag around one seed run
 * - SeedRunner: writes a template to the group, rule and simulation stores
 * - FileTemplateLoader: reads `<name>.json` from a data directory
 *
 * @example
 * ```typescript
 * const result = await coordinator.trySeed();
 * result.match(
 *     (outcome) => logger.info({ outcome }, 'Seed attempt finished'),
 *     (error) => logger.error({ error }, describeSeedError(error)),
 * );
 * ```
 */

export {
	StoreErrors,
	TemplateErrors,
	SeedErrors,
	describeSeedError,
	describeStoreError,
	type StoreError,
	type TemplateError,
	type SeedError,
} from './errors.js';

export {
	GroupSchema,
	RuleSchema,
	SimulationSchema,
	TemplateSchema,
	parseTemplate,
	validateTemplate,
	type Group,
	type Rule,
	type Simulation,
	type Template,
	type TemplateWarning,
} from './template.js';

export { SolutionType, parseSolutionType } from './solution-type.js';
export { FileTemplateLoader, DEFAULT_DATA_DIR } from './template-loader.js';
export { SeedRunner, type SeedRunnerDeps } from './seed-runner.js';
export { SeedCoordinator, type SeedCoordinatorConfig, type SeedCoordinatorDeps } from './seed-coordinator.js';

export {
	ANY_ETAG,
	COMPLETED_FLAG_KEY,
	MUTEX_KEY,
	MUTEX_TIMEOUT_MS,
	SEED_COLLECTION_ID,
	type ETag,
	type FlagStore,
	type GroupStore,
	type MutexService,
	type RuleStore,
	type SeedOutcome,
	type SimulationStore,
	type SkipReason,
	type StoredValue,
	type TemplateLoader,
} from './types.js';
