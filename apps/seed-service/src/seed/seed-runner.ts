import { ResultAsync, err, ok, type Result } from 'neverthrow';
import type { Logger } from '@solution-seeder/logging';
import { SeedErrors, describeStoreError, type SeedError } from './errors.js';
import { SolutionType } from './solution-type.js';
import { validateTemplate, type Template, type TemplateWarning } from './template.js';
import {
	ANY_ETAG,
	type GroupStore,
	type RuleStore,
	type SimulationStore,
	type TemplateLoader,
} from './types.js';

export interface SeedRunnerDeps {
	templateLoader: TemplateLoader;
	groupStore: GroupStore;
	ruleStore: RuleStore;
	simulationStore: SimulationStore;
	logger: Logger;
}

const WARNING_MESSAGES: Record<TemplateWarning['type'], string> = {
	duplicate_group_ids: 'Found duplicated group ID',
	duplicate_rule_ids: 'Found duplicated rule ID',
	dangling_group_reference: 'Invalid group ID found in rules',
};

/**
 * Writes the contents of a template to the remote stores.
 *
 * Each step stops at the first failed write; earlier writes stay applied.
 * Every write is an unconditional upsert so a later run can start over.
 */
export class SeedRunner {
	private readonly templateLoader: TemplateLoader;
	private readonly groupStore: GroupStore;
	private readonly ruleStore: RuleStore;
	private readonly simulationStore: SimulationStore;
	private readonly logger: Logger;

	constructor(deps: SeedRunnerDeps) {
		this.templateLoader = deps.templateLoader;
		this.groupStore = deps.groupStore;
		this.ruleStore = deps.ruleStore;
		this.simulationStore = deps.simulationStore;
		this.logger = deps.logger.child({ component: 'SeedRunner' });
	}

	run(templateName: string, solutionType: SolutionType): ResultAsync<void, SeedError> {
		return new ResultAsync(this.runSequence(templateName, solutionType));
	}

	/**
	 * Create the template's simulations unless a default simulation exists.
	 */
	seedSimulation(templateName: string): ResultAsync<void, SeedError> {
		return new ResultAsync(this.seedSimulationSequence(templateName));
	}

	private async runSequence(templateName: string, solutionType: SolutionType): Promise<Result<void, SeedError>> {
		const loaded = await this.templateLoader.load(templateName);
		if (loaded.isErr()) {
			return err(loaded.error);
		}
		const template = loaded.value;

		for (const warning of validateTemplate(template)) {
			const { type, ...details } = warning;
			this.logger.warn({ templateName, ...details }, WARNING_MESSAGES[type]);
		}

		if (solutionType === SolutionType.DEVICE_SIMULATION) {
			this.logger.info({ templateName }, 'Device simulation solution, skipping groups and rules');
		} else {
			const groups = await this.seedGroups(template);
			if (groups.isErr()) {
				return groups;
			}

			const rules = await this.seedRules(template);
			if (rules.isErr()) {
				return rules;
			}
		}

		return this.seedSimulationSequence(templateName);
	}

	private async seedGroups(template: Template): Promise<Result<void, SeedError>> {
		for (const group of template.groups) {
			const result = await this.groupStore.upsert(group.id, group, ANY_ETAG);
			if (result.isErr()) {
				this.logger.error(
					{ groupId: group.id, displayName: group.displayName, error: describeStoreError(result.error) },
					`Failed to seed default group ${group.displayName}`,
				);
				return err(SeedErrors.groupSeedFailed(group.id, group.displayName, result.error));
			}
		}
		this.logger.info({ count: template.groups.length }, 'Default groups seeded');
		return ok(undefined);
	}

	private async seedRules(template: Template): Promise<Result<void, SeedError>> {
		for (const rule of template.rules) {
			const result = await this.ruleStore.upsert(rule, ANY_ETAG);
			if (result.isErr()) {
				this.logger.error(
					{ ruleId: rule.id, description: rule.description, error: describeStoreError(result.error) },
					`Failed to seed default rule ${rule.description}`,
				);
				return err(SeedErrors.ruleSeedFailed(rule.id, rule.description, result.error));
			}
		}
		this.logger.info({ count: template.rules.length }, 'Default rules seeded');
		return ok(undefined);
	}

	private async seedSimulationSequence(templateName: string): Promise<Result<void, SeedError>> {
		const existing = await this.simulationStore.getDefault();
		if (existing.isErr()) {
			this.logger.error({ error: describeStoreError(existing.error) }, 'Failed to seed default simulations');
			return err(SeedErrors.simulationSeedFailed('query', null, existing.error));
		}

		if (existing.value !== null) {
			this.logger.info(
				{ simulationId: existing.value.id },
				'Skip seed simulation since there is already one simulation',
			);
			return ok(undefined);
		}

		const loaded = await this.templateLoader.load(templateName);
		if (loaded.isErr()) {
			this.logger.error({ templateName, error: loaded.error.message }, 'Failed to seed default simulations');
			return err(SeedErrors.simulationSeedFailed('create', null, loaded.error));
		}

		for (const simulation of loaded.value.simulations) {
			const created = await this.simulationStore.create(simulation);
			if (created.isErr()) {
				this.logger.error(
					{ simulationId: simulation.id, error: describeStoreError(created.error) },
					'Failed to seed default simulations',
				);
				return err(SeedErrors.simulationSeedFailed('create', simulation.id ?? null, created.error));
			}
		}

		this.logger.info({ count: loaded.value.simulations.length }, 'Default simulations seeded');
		return ok(undefined);
	}
}
