import { CommonEnvSchemas, parseEnv, z } from '@solution-seeder/config';
import { parseSolutionType } from './seed/solution-type.js';
import { DEFAULT_DATA_DIR } from './seed/template-loader.js';

/**
 * Seed service environment configuration
 */
export const envSchema = z.object({
	NODE_ENV: CommonEnvSchemas.nodeEnv,
	LOG_LEVEL: CommonEnvSchemas.logLevel,

	// Instance identification, also the Redis lease owner
	INSTANCE_ID: z.string().default(() => `seed-${Date.now()}`),

	/**
	 * Template to seed from, without the .json extension.
	 * Empty or unset disables seeding.
	 */
	SEED_TEMPLATE: z
		.string()
		.optional()
		.transform((v) => v?.trim() ?? ''),

	/**
	 * Solution flavour, e.g. "RemoteMonitoring" or "DeviceSimulation".
	 */
	SOLUTION_TYPE: z
		.string()
		.prefault('RemoteMonitoring')
		.transform((value, ctx) => {
			const type = parseSolutionType(value);
			if (type === null) {
				ctx.issues.push({
					code: 'custom',
					message: `Unknown solution type "${value}", expected RemoteMonitoring or DeviceSimulation`,
					input: value,
				});
				return z.NEVER;
			}
			return type;
		}),

	/** Directory holding `<template>.json` files */
	SEED_DATA_DIR: z.string().default(DEFAULT_DATA_DIR),

	// Downstream services
	STORAGE_ADAPTER_URL: z.url().default('http://localhost:9022/v1'),
	TELEMETRY_URL: z.url().default('http://localhost:9004/v1'),
	DEVICE_SIMULATION_URL: z.url().default('http://localhost:9003/v1'),
	HTTP_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault('10000'),

	/**
	 * Where the seed mutex lives.
	 * - storage: lease record in the storage adapter (default)
	 * - redis: SET NX PX lease, requires REDIS_URL
	 */
	MUTEX_BACKEND: z.enum(['storage', 'redis']).default('storage'),
	REDIS_URL: CommonEnvSchemas.optionalUrl,
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
	return parseEnv(envSchema, source);
}
