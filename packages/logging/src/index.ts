/**
 * @inkpost/logging
 *
 * Structured JSON logging on pino. Every record carries the service name and
 * an ISO timestamp, with the level written as its label.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

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

export interface LoggerConfig {
	level: LogLevel;
	/** Written as `service` on every record */
	serviceName: string;
	/** Human-readable output through pino-pretty (development only) */
	pretty?: boolean;
	/** Extra bindings merged into every record */
	base?: Record<string, unknown>;
	/** Where JSON records go (default: stdout). Ignored when `pretty` is set. */
	destination?: DestinationStream;
}

function baseOptions(config: LoggerConfig): LoggerOptions {
	return {
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
}

export function createLogger(config: LoggerConfig): Logger {
	const options = baseOptions(config);

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

	return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Child logger carrying extra bindings, e.g. `{ component: 'unit-of-work' }`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
	return parent.child(bindings);
}

// Used by components that are not handed a logger. Replaced by the driver at startup.
let defaultLogger: Logger = pino({ level: process.env['LOG_LEVEL'] ?? LogLevel.INFO });

export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

export function getLogger(): Logger {
	return defaultLogger;
}

/**
 * Bindings of the per-kind flush records written by the unit of work.
 */
export interface CommitContext {
	kind: string;
	operation: 'insert' | 'update' | 'delete';
	count: number;
	[key: string]: unknown;
}
