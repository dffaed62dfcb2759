/**
 * Logger - File-based logging with hourly rotation.
 *
 * Provides two logger implementations:
 * - createServiceLogger: Per-service hourly rotation under the Runway home
 * - createNullLogger: No-op for testing
 */

import fs from 'node:fs';
import {
	getServiceLogPath,
	getServiceLogsDir,
	type ServiceName,
} from './constants.js';

// ============================================================================
// Types
// ============================================================================

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

// ============================================================================
// Formatting
// ============================================================================

function describeError(error: Error): string {
	let text = `\n  Error: ${error.name}: ${error.message}`;
	if (error.stack) text += `\n  Stack: ${error.stack}`;
	// CatalogLoadError and HistoryPersistenceError wrap the fs or parse error
	if (error.cause instanceof Error) {
		text += `\n  Cause: ${error.cause.message}`;
	}
	return text;
}

function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra: object | undefined,
): string {
	const timestamp = new Date().toISOString();
	const head = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] ${component}: ${message}`;
	if (extra === undefined) return head;
	if (extra instanceof Error) return head + describeError(extra);
	return `${head}\n  ${JSON.stringify(extra)}`;
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}

/**
 * Create a service logger appending to an hourly file under the Runway home:
 * {home}/logs/{service}/YYYY-MM-DD-HH.log
 *
 * The path is recomputed on every write, so files rotate on the hour and a
 * removed logs directory is recreated. Write failures are dropped.
 *
 * @example
 * const logger = createServiceLogger('engine');
 * logger.warn('InstalledProvider', 'Program index query failed', {pattern});
 */
export function createServiceLogger(service: ServiceName): Logger {
	const log = (
		level: LogLevel,
		component: string,
		message: string,
		extra?: object,
	): void => {
		const entry = formatEntry(level, component, message, extra);
		try {
			fs.mkdirSync(getServiceLogsDir(service), {recursive: true});
			fs.appendFileSync(getServiceLogPath(service), entry + '\n');
		} catch {
			// Logging never takes the launcher down
		}
	};

	return {
		debug: (component, message, data) => log('debug', component, message, data),
		info: (component, message, data) => log('info', component, message, data),
		warn: (component, message, data) => log('warn', component, message, data),
		error: (component, message, error) => log('error', component, message, error),
	};
}
