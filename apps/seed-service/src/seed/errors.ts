/**
 * Seed error types using discriminated unions for neverthrow
 */

/**
 * Failures reported by the remote stores (storage adapter, telemetry, simulation)
 */
export type StoreError =
	| { type: 'not_found'; resource: string }
	| { type: 'conflict'; resource: string; message: string }
	| { type: 'http_error'; resource: string; statusCode: number; message: string }
	| { type: 'unreachable'; resource: string; cause: Error }
	| { type: 'invalid_response'; resource: string; message: string };

/**
 * Failures loading a named template
 */
export type TemplateError =
	| { type: 'not_found'; templateName: string; message: string }
	| { type: 'invalid_input'; templateName: string; message: string; cause: Error };

/**
 * Everything that can abort a seed attempt
 */
export type SeedError =
	| TemplateError
	| { type: 'group_seed_failed'; groupId: string; displayName: string; cause: StoreError }
	| { type: 'rule_seed_failed'; ruleId: string; description: string; cause: StoreError }
	| {
			type: 'simulation_seed_failed';
			operation: 'query' | 'create';
			simulationId: string | null;
			cause: StoreError | TemplateError;
	  }
	| { type: 'completion_flag_failed'; operation: 'read' | 'write'; cause: StoreError };

/**
 * Wrap a thrown value as an Error without losing it
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/**
 * Helper to create store errors
 */
export const StoreErrors = {
	notFound: (resource: string): StoreError => ({
		type: 'not_found',
		resource,
	}),
	conflict: (resource: string, message: string): StoreError => ({
		type: 'conflict',
		resource,
		message,
	}),
	httpError: (resource: string, statusCode: number, message: string): StoreError => ({
		type: 'http_error',
		resource,
		statusCode,
		message,
	}),
	unreachable: (resource: string, cause: unknown): StoreError => ({
		type: 'unreachable',
		resource,
		cause: toError(cause),
	}),
	invalidResponse: (resource: string, message: string): StoreError => ({
		type: 'invalid_response',
		resource,
		message,
	}),
};

/**
 * Helper to create template errors
 */
export const TemplateErrors = {
	notFound: (templateName: string): TemplateError => ({
		type: 'not_found',
		templateName,
		message: `Template ${templateName} does not exist`,
	}),
	invalidInput: (templateName: string, message: string, cause: unknown): TemplateError => ({
		type: 'invalid_input',
		templateName,
		message,
		cause: toError(cause),
	}),
};

/**
 * Helper to create seed errors
 */
export const SeedErrors = {
	groupSeedFailed: (groupId: string, displayName: string, cause: StoreError): SeedError => ({
		type: 'group_seed_failed',
		groupId,
		displayName,
		cause,
	}),
	ruleSeedFailed: (ruleId: string, description: string, cause: StoreError): SeedError => ({
		type: 'rule_seed_failed',
		ruleId,
		description,
		cause,
	}),
	simulationSeedFailed: (
		operation: 'query' | 'create',
		simulationId: string | null,
		cause: StoreError | TemplateError,
	): SeedError => ({
		type: 'simulation_seed_failed',
		operation,
		simulationId,
		cause,
	}),
	completionFlagFailed: (operation: 'read' | 'write', cause: StoreError): SeedError => ({
		type: 'completion_flag_failed',
		operation,
		cause,
	}),
};

export function describeStoreError(error: StoreError): string {
	switch (error.type) {
		case 'not_found':
			return `${error.resource} not found`;
		case 'conflict':
			return `${error.resource} conflict: ${error.message}`;
		case 'http_error':
			return `${error.resource} returned HTTP ${error.statusCode}: ${error.message}`;
		case 'unreachable':
			return `${error.resource} unreachable: ${error.cause.message}`;
		case 'invalid_response':
			return `${error.resource} sent an invalid response: ${error.message}`;
	}
}

function describeCause(cause: StoreError | TemplateError): string {
	return 'templateName' in cause ? cause.message : describeStoreError(cause);
}

/**
 * Render a seed error as a single log line
 */
export function describeSeedError(error: SeedError): string {
	switch (error.type) {
		case 'not_found':
			return error.message;
		case 'invalid_input':
			return `${error.message}: ${error.cause.message}`;
		case 'group_seed_failed':
			return `Failed to seed default group ${error.displayName} (${error.groupId}): ${describeStoreError(error.cause)}`;
		case 'rule_seed_failed':
			return `Failed to seed default rule ${error.description} (${error.ruleId}): ${describeStoreError(error.cause)}`;
		case 'simulation_seed_failed': {
			const target = error.simulationId === null ? 'default simulations' : `simulation ${error.simulationId}`;
			return `Failed to ${error.operation} ${target}: ${describeCause(error.cause)}`;
		}
		case 'completion_flag_failed':
			return `Failed to ${error.operation} seed completion flag: ${describeStoreError(error.cause)}`;
	}
}
