/**
 * Constants - Paths and tuning defaults shared across the engine.
 *
 * All persisted launcher data (config, history, catalog, logs) lives under
 * the Runway home directory.
 */

import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Environment variable to override the Runway home directory.
 */
export const RUNWAY_HOME_ENV = 'RUNWAY_HOME';

/**
 * Get the Runway home directory.
 *
 * Default: ~/.local/share/runway
 * Override: $RUNWAY_HOME
 * Linux (conventional): $XDG_DATA_HOME/runway
 */
export function getRunwayHomeDir(): string {
	const override = process.env[RUNWAY_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_DATA_HOME']?.trim();
	if (xdg) return path.join(xdg, 'runway');

	return path.join(os.homedir(), '.local', 'share', 'runway');
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(): string {
	return path.join(getRunwayHomeDir(), 'config.json');
}

/**
 * Get the path to the persisted command history.
 */
export function getHistoryPath(): string {
	return path.join(getRunwayHomeDir(), 'history.json');
}

/**
 * Get the default location of the offline package catalog.
 */
export function getCatalogPath(): string {
	return path.join(getRunwayHomeDir(), 'catalog.json');
}

// ============================================================================
// Logging Paths
// ============================================================================

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(): string {
	return path.join(getRunwayHomeDir(), 'logs');
}

/**
 * Service names for logging.
 */
export type ServiceName = 'engine' | 'cli';

/**
 * Get the path to a service's log directory.
 */
export function getServiceLogsDir(service: ServiceName): string {
	return path.join(getLogsDir(), service);
}

/**
 * Get the path to a service's current hourly log file.
 * Format: {home}/logs/{service}/YYYY-MM-DD-HH.log
 */
export function getServiceLogPath(service: ServiceName): string {
	const now = new Date();
	const year = now.getFullYear();
	const month = String(now.getMonth() + 1).padStart(2, '0');
	const day = String(now.getDate()).padStart(2, '0');
	const hour = String(now.getHours()).padStart(2, '0');
	const filename = `${year}-${month}-${day}-${hour}.log`;
	return path.join(getServiceLogsDir(service), filename);
}

// ============================================================================
// Program Index Roots
// ============================================================================

/**
 * Default directories scanned for installed programs on this platform.
 *
 * macOS: application bundles (system, local and per-user).
 * Linux: XDG `applications` directories holding `.desktop` entries.
 */
export function getDefaultProgramRoots(
	platform: NodeJS.Platform = process.platform,
	homeDir: string = os.homedir(),
): string[] {
	if (platform === 'darwin') {
		return [
			'/Applications',
			'/System/Applications',
			'/System/Library/CoreServices',
			path.join(homeDir, 'Applications'),
		];
	}

	if (platform === 'win32') {
		const programData = process.env['ProgramData'] ?? 'C:\\ProgramData';
		const appData =
			process.env['APPDATA'] ?? path.join(homeDir, 'AppData', 'Roaming');
		return [
			path.join(programData, 'Microsoft', 'Windows', 'Start Menu', 'Programs'),
			path.join(appData, 'Microsoft', 'Windows', 'Start Menu', 'Programs'),
		];
	}

	const dataHome =
		process.env['XDG_DATA_HOME']?.trim() ||
		path.join(homeDir, '.local', 'share');
	const dataDirs = (
		process.env['XDG_DATA_DIRS']?.trim() || '/usr/local/share:/usr/share'
	)
		.split(':')
		.filter(dir => dir.length > 0);

	const roots = [dataHome, ...dataDirs].map(dir =>
		path.join(dir, 'applications'),
	);
	return [...new Set(roots)];
}
