import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
	SILENT: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context, e.g. the instance id */
	base?: Record<string, unknown>;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	return pino(options);
}

/**
 * Logger that discards everything. Used by tests and by callers embedding
 * the seeder without wanting its output.
 */
export function createSilentLogger(): Logger {
	return pino({ level: LogLevel.SILENT });
}

/**
 * Default logger instance (can be replaced)
 */
let defaultLogger: Logger = pino({ level: LogLevel.INFO });

/**
 * Set the default logger instance
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
	return defaultLogger;
}
