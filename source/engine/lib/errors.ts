/**
 * Error classes raised by the engine's configuration and storage layers.
 *
 * Search itself never throws across its inbound boundary: provider and
 * classifier failures collapse to empty result sets.
 */

/**
 * Error thrown when config.json exists but cannot be parsed or validated.
 */
export class ConfigError extends Error {
	readonly path: string;

	constructor(path: string, message: string) {
		super(`Invalid config at ${path}: ${message}`);
		this.name = 'ConfigError';
		this.path = path;
	}
}

/**
 * Error thrown when a catalog document exists but cannot be read or parsed.
 */
export class CatalogLoadError extends Error {
	readonly path: string;

	constructor(path: string, message: string, options?: {cause?: unknown}) {
		super(`Failed to load catalog from ${path}: ${message}`, options);
		this.name = 'CatalogLoadError';
		this.path = path;
	}
}

/**
 * Error thrown when the command history cannot be written.
 */
export class HistoryPersistenceError extends Error {
	readonly path: string;

	constructor(path: string, message: string, options?: {cause?: unknown}) {
		super(`Failed to persist history to ${path}: ${message}`, options);
		this.name = 'HistoryPersistenceError';
		this.path = path;
	}
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Coerce an unknown thrown value into an Error for logging.
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
