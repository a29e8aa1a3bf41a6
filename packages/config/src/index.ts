import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		throw new Error(`Environment validation failed:\n${formatIssues(result.error).join('\n')}`);
	}

	return result.data;
}

/**
 * One line per failing variable, e.g. `  PORT: Invalid input`.
 */
function formatIssues(error: z.ZodError): string[] {
	const tree = z.treeifyError(error);
	const lines: string[] = [];

	if ('properties' in tree && tree.properties) {
		for (const [key, sub] of Object.entries(tree.properties)) {
			const messages = subtreeErrors(sub);
			if (messages.length > 0) {
				lines.push(`  ${key}: ${messages.join(', ')}`);
			}
		}
	}

	if (lines.length === 0) {
		lines.push(...tree.errors.map((message) => `  ${message}`));
	}

	return lines;
}

function subtreeErrors(node: unknown): string[] {
	if (typeof node !== 'object' || node === null || !('errors' in node)) {
		return [];
	}
	const { errors } = node;
	return Array.isArray(errors) ? errors.filter((e): e is string => typeof e === 'string') : [];
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	/** Node environment */
	nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	/** URL validation */
	url: z.url(),

	/** Optional URL */
	optionalUrl: z.url().optional(),

	/** Duration in milliseconds from string */
	durationMs: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(0)),
};

/**
 * Type helper to extract config type from schema
 */
export type ConfigType<T extends z.ZodObject<z.ZodRawShape>> = z.infer<T>;
