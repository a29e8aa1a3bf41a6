import type { Logger } from '@solution-seeder/logging';
import type { Dispatcher } from 'undici';
import { DeviceGroupStore } from './clients/device-group-store.js';
import { DeviceSimulationClient } from './clients/device-simulation-client.js';
import { StorageAdapterClient } from './clients/storage-adapter-client.js';
import { TelemetryClient } from './clients/telemetry-client.js';
import type { Env } from './env.js';
import { createMutex, type MutexHandle } from './mutex/index.js';
import { SeedCoordinator } from './seed/seed-coordinator.js';
import { SeedRunner } from './seed/seed-runner.js';
import { FileTemplateLoader } from './seed/template-loader.js';

export interface SeedService {
	coordinator: SeedCoordinator;
	/** Release connections held by the mutex backend */
	close(): Promise<void>;
}

/**
 * Wire the coordinator to the HTTP clients and the configured mutex backend.
 */
export async function createSeedService(env: Env, logger: Logger, dispatcher?: Dispatcher): Promise<SeedService> {
	const http = { timeoutMs: env.HTTP_TIMEOUT_MS, dispatcher };

	const storage = new StorageAdapterClient({ ...http, baseUrl: env.STORAGE_ADAPTER_URL });
	const telemetry = new TelemetryClient({ ...http, baseUrl: env.TELEMETRY_URL });
	const simulations = new DeviceSimulationClient({ ...http, baseUrl: env.DEVICE_SIMULATION_URL });

	const handle: MutexHandle = await createMutex(
		{ backend: env.MUTEX_BACKEND, instanceId: env.INSTANCE_ID, redisUrl: env.REDIS_URL },
		storage,
		logger,
	);

	const runner = new SeedRunner({
		templateLoader: new FileTemplateLoader(env.SEED_DATA_DIR, logger),
		groupStore: new DeviceGroupStore(storage),
		ruleStore: telemetry,
		simulationStore: simulations,
		logger,
	});

	const coordinator = new SeedCoordinator({
		config: { seedTemplate: env.SEED_TEMPLATE, solutionType: env.SOLUTION_TYPE },
		mutex: handle.mutex,
		flagStore: storage,
		runner,
		logger,
	});

	return { coordinator, close: handle.close };
}
