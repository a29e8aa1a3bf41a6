import { createLogger, getLogger, setDefaultLogger } from '@solution-seeder/logging';
import { createSeedService } from './app.js';
import { loadEnv } from './env.js';
import { describeSeedError } from './seed/errors.js';

/**
 * Run one seed attempt and exit. Exit code 1 means the seed failed and
 * should be retried by running the service again.
 */
async function main(): Promise<void> {
	const env = loadEnv();

	const logger = createLogger({
		level: env.LOG_LEVEL,
		serviceName: 'seed-service',
		pretty: env.NODE_ENV === 'development',
		base: { instanceId: env.INSTANCE_ID },
	});
	setDefaultLogger(logger);

	const service = await createSeedService(env, logger);

	const result = await service.coordinator.trySeed();
	await service.close();

	result.match(
		(outcome) => {
			logger.info({ outcome }, 'Seed attempt finished');
		},
		(error) => {
			logger.fatal({ error }, describeSeedError(error));
			process.exitCode = 1;
		},
	);
}

main().catch((error: unknown) => {
	getLogger().fatal({ err: error }, 'Seed service failed to start');
	process.exitCode = 1;
});
