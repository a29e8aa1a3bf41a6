import { describe, it, expect } from 'vitest';
import { createSilentLogger } from '@solution-seeder/logging';
import { StoreErrors, TemplateErrors } from '../seed/errors.js';
import { SeedRunner } from '../seed/seed-runner.js';
import { SolutionType } from '../seed/solution-type.js';
import type { Template } from '../seed/template.js';
import {
	InMemoryKeyValueStore,
	InMemorySimulationStore,
	RecordingGroupStore,
	RecordingRuleStore,
	StaticTemplateLoader,
} from './support/in-memory.js';
import { DeviceGroupStore } from '../clients/device-group-store.js';

const logger = createSilentLogger();

const template: Template = {
	groups: [
		{ id: 'g1', displayName: 'Floor1' },
		{ id: 'g2', displayName: 'Floor2' },
	],
	rules: [
		{ id: 'r1', groupId: 'g1', description: 'HighTemp' },
		{ id: 'r2', groupId: 'g1', description: 'LowTemp' },
		{ id: 'r3', groupId: 'g2', description: 'Humidity' },
	],
	simulations: [{ id: '1', enabled: true }],
};

function createRunner(
	overrides: {
		groups?: RecordingGroupStore;
		rules?: RecordingRuleStore;
		simulations?: InMemorySimulationStore;
		loader?: StaticTemplateLoader;
	} = {},
) {
	const groups = overrides.groups ?? new RecordingGroupStore();
	const rules = overrides.rules ?? new RecordingRuleStore();
	const simulations = overrides.simulations ?? new InMemorySimulationStore();
	const loader = overrides.loader ?? new StaticTemplateLoader(template);
	const runner = new SeedRunner({
		templateLoader: loader,
		groupStore: groups,
		ruleStore: rules,
		simulationStore: simulations,
		logger,
	});
	return { runner, groups, rules, simulations, loader };
}

describe('SeedRunner', () => {
	describe('run', () => {
		it('should write groups and rules in template order', async () => {
			const { runner, groups, rules } = createRunner();

			const result = await runner.run('default', SolutionType.REMOTE_MONITORING);

			expect(result.isOk()).toBe(true);
			expect(groups.ids()).toEqual(['g1', 'g2']);
			expect(rules.ids()).toEqual(['r1', 'r2', 'r3']);
		});

		it('should load the template again before creating simulations', async () => {
			const { runner, loader, simulations } = createRunner();

			await runner.run('default', SolutionType.REMOTE_MONITORING);

			expect(loader.loads).toBe(2);
			expect(simulations.created).toEqual([{ id: '1', enabled: true }]);
		});

		it('should stop at the first failed rule', async () => {
			const rules = new RecordingRuleStore(2);
			const { runner, simulations } = createRunner({ rules });

			const result = await runner.run('default', SolutionType.REMOTE_MONITORING);

			expect(result._unsafeUnwrapErr()).toEqual({
				type: 'rule_seed_failed',
				ruleId: 'r2',
				description: 'LowTemp',
				cause: StoreErrors.httpError('telemetry', 503, 'unavailable'),
			});
			expect(rules.ids()).toEqual(['r1']);
			expect(rules.attempts).toBe(2);
			expect(simulations.created).toEqual([]);
		});

		it('should not touch rules when a group fails', async () => {
			const groups = new RecordingGroupStore(1);
			const { runner, rules } = createRunner({ groups });

			const result = await runner.run('default', SolutionType.REMOTE_MONITORING);

			expect(result._unsafeUnwrapErr().type).toBe('group_seed_failed');
			expect(rules.attempts).toBe(0);
		});

		it('should return template errors unchanged', async () => {
			const error = TemplateErrors.invalidInput('broken', 'Failed to parse template', new Error('Unexpected token'));
			const { runner, groups } = createRunner({ loader: new StaticTemplateLoader(error) });

			const result = await runner.run('broken', SolutionType.REMOTE_MONITORING);

			expect(result._unsafeUnwrapErr()).toBe(error);
			expect(groups.attempts).toBe(0);
		});

		it('should reach the same state when run twice', async () => {
			const store = new InMemoryKeyValueStore();
			const groupStore = new DeviceGroupStore(store);
			const simulations = new InMemorySimulationStore();
			const runner = new SeedRunner({
				templateLoader: new StaticTemplateLoader(template),
				groupStore,
				ruleStore: new RecordingRuleStore(),
				simulationStore: simulations,
				logger,
			});

			await runner.run('default', SolutionType.REMOTE_MONITORING);
			const afterFirst = [...store.entries.entries()].map(([id, entry]) => [id, entry.data]);
			await runner.run('default', SolutionType.REMOTE_MONITORING);
			const afterSecond = [...store.entries.entries()].map(([id, entry]) => [id, entry.data]);

			expect(afterSecond).toEqual(afterFirst);
			expect(afterFirst).toEqual([
				['devicegroups/g1', JSON.stringify({ id: 'g1', displayName: 'Floor1' })],
				['devicegroups/g2', JSON.stringify({ id: 'g2', displayName: 'Floor2' })],
			]);
			expect(simulations.created).toHaveLength(1);
		});
	});

	describe('seedSimulation', () => {
		it('should skip when a default simulation already exists', async () => {
			const simulations = new InMemorySimulationStore({ id: '1', enabled: false });
			const { runner, loader } = createRunner({ simulations });

			const result = await runner.seedSimulation('default');

			expect(result.isOk()).toBe(true);
			expect(simulations.created).toEqual([]);
			expect(loader.loads).toBe(0);
		});

		it('should create every simulation listed in the template', async () => {
			const loader = new StaticTemplateLoader({
				groups: [],
				rules: [],
				simulations: [{ id: '1' }, { id: '2' }],
			});
			const { runner, simulations } = createRunner({ loader });

			const result = await runner.seedSimulation('default');

			expect(result.isOk()).toBe(true);
			expect(simulations.created).toEqual([{ id: '1' }, { id: '2' }]);
		});

		it('should fail when the simulation service cannot be queried', async () => {
			const simulations = new InMemorySimulationStore();
			simulations.queryError = StoreErrors.httpError('device-simulation', 500, 'oops');
			const { runner } = createRunner({ simulations });

			const result = await runner.seedSimulation('default');

			expect(result._unsafeUnwrapErr()).toEqual({
				type: 'simulation_seed_failed',
				operation: 'query',
				simulationId: null,
				cause: StoreErrors.httpError('device-simulation', 500, 'oops'),
			});
		});

		it('should fail when a simulation cannot be created', async () => {
			const simulations = new InMemorySimulationStore();
			simulations.createError = StoreErrors.conflict('device-simulation', 'busy');
			const { runner } = createRunner({ simulations });

			const result = await runner.seedSimulation('default');

			expect(result._unsafeUnwrapErr()).toEqual({
				type: 'simulation_seed_failed',
				operation: 'create',
				simulationId: '1',
				cause: StoreErrors.conflict('device-simulation', 'busy'),
			});
		});
	});
});
