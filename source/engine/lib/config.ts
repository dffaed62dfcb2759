/**
 * Config - Launcher configuration loading and management.
 *
 * Configuration is stored globally under the Runway home dir
 * (default: ~/.local/share/runway, override via $RUNWAY_HOME).
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {getCatalogPath, getConfigPath} from './constants.js';
import {ConfigError} from './errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command history ranking and retention.
 */
export interface HistoryConfig {
	/** Maximum number of remembered commands (default: 200) */
	maxEntries: number;
	/** Entries shown for an empty query (default: 8) */
	recentLimit: number;
	/** Fuzzy matches taken per query (default: 8) */
	fuzzyLimit: number;
	/** Base score of every history candidate (default: 200) */
	baseScore: number;
	/** Recency bonus per rank step (default: 10) */
	recencyStep: number;
	/** Score floor for a command equal to the query (default: 1000) */
	exactFloor: number;
	/** Matches trailing the best one by more than this are dropped (default: 120) */
	pruneWindow: number;
}

/**
 * Installed-programs provider and program index settings.
 */
export interface InstalledConfig {
	/** Cap on program index records scored per query (default: 300) */
	metadataLimit: number;
	/** Query length needed to surface system or embedded programs (default: 5) */
	minSystemQueryLength: number;
	/** Concurrent program index queries (default: 2) */
	queryConcurrency: number;
	/** Directories to scan. Empty = platform defaults. */
	searchRoots: string[];
	/** Directory depth scanned below each root (default: 4) */
	maxDepth: number;
	/** How long a program scan stays fresh (default: 60s) */
	refreshIntervalMs: number;
}

export interface CatalogConfig {
	/** Catalog JSON location. Unset = {home}/catalog.json */
	path?: string;
	/** Score subtracted from deprecated entries (default: 200) */
	deprecationPenalty: number;
}

export interface ClassifierConfig {
	/** Detect URLs and filesystem paths in the query (default: true) */
	enabled: boolean;
	/** Maximum directory children listed for a path query (default: 50) */
	maxListing: number;
}

export interface RunwayConfig {
	version: number;
	history: HistoryConfig;
	installed: InstalledConfig;
	catalog: CatalogConfig;
	classifier: ClassifierConfig;
	/** Per-provider deadline; 0 disables it (default: 0) */
	providerTimeoutMs: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_HISTORY_CONFIG: HistoryConfig = {
	maxEntries: 200,
	recentLimit: 8,
	fuzzyLimit: 8,
	baseScore: 200,
	recencyStep: 10,
	exactFloor: 1000,
	pruneWindow: 120,
};

export const DEFAULT_INSTALLED_CONFIG: InstalledConfig = {
	metadataLimit: 300,
	minSystemQueryLength: 5,
	queryConcurrency: 2,
	searchRoots: [],
	maxDepth: 4,
	refreshIntervalMs: 60_000,
};

export const DEFAULT_CATALOG_CONFIG: CatalogConfig = {
	deprecationPenalty: 200,
};

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
	enabled: true,
	maxListing: 50,
};

export const DEFAULT_CONFIG: RunwayConfig = {
	version: 1,
	history: DEFAULT_HISTORY_CONFIG,
	installed: DEFAULT_INSTALLED_CONFIG,
	catalog: DEFAULT_CATALOG_CONFIG,
	classifier: DEFAULT_CLASSIFIER_CONFIG,
	providerTimeoutMs: 0,
};

// ============================================================================
// Schema
// ============================================================================

const count = z.number().int().min(0);
const positive = z.number().int().min(1);

const configFileSchema = z.object({
	version: z.number().int().optional(),
	history: z
		.object({
			maxEntries: positive,
			recentLimit: count,
			fuzzyLimit: positive,
			baseScore: count,
			recencyStep: count,
			exactFloor: count,
			pruneWindow: count,
		})
		.partial()
		.optional(),
	installed: z
		.object({
			metadataLimit: positive,
			minSystemQueryLength: count,
			queryConcurrency: positive,
			searchRoots: z.array(z.string().min(1)),
			maxDepth: positive,
			refreshIntervalMs: count,
		})
		.partial()
		.optional(),
	catalog: z
		.object({
			path: z.string().min(1),
			deprecationPenalty: count,
		})
		.partial()
		.optional(),
	classifier: z
		.object({
			enabled: z.boolean(),
			maxListing: positive,
		})
		.partial()
		.optional(),
	providerTimeoutMs: count.optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Merge a validated config document over the defaults, section by section.
 */
export function resolveConfig(file: ConfigFile = {}): RunwayConfig {
	return {
		version: file.version ?? DEFAULT_CONFIG.version,
		history: {...DEFAULT_HISTORY_CONFIG, ...file.history},
		installed: {...DEFAULT_INSTALLED_CONFIG, ...file.installed},
		catalog: {...DEFAULT_CATALOG_CONFIG, ...file.catalog},
		classifier: {...DEFAULT_CLASSIFIER_CONFIG, ...file.classifier},
		providerTimeoutMs:
			file.providerTimeoutMs ?? DEFAULT_CONFIG.providerTimeoutMs,
	};
}

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Load config from disk, merging with defaults.
 * Returns the defaults if no config file exists.
 *
 * If the file exists but can't be parsed or fails validation, this throws a
 * ConfigError instead of silently falling back to defaults.
 */
export async function loadConfig(
	configPath: string = getConfigPath(),
): Promise<RunwayConfig> {
	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch (error) {
		if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
			return resolveConfig();
		}
		throw error;
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (parseError) {
		throw new ConfigError(
			configPath,
			parseError instanceof Error ? parseError.message : String(parseError),
		);
	}

	const parsed = configFileSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ');
		throw new ConfigError(configPath, issues);
	}

	return resolveConfig(parsed.data);
}

/**
 * Save config to disk, creating the home directory if needed.
 */
export async function saveConfig(
	config: RunwayConfig,
	configPath: string = getConfigPath(),
): Promise<void> {
	await fs.mkdir(path.dirname(configPath), {recursive: true});
	await fs.writeFile(configPath, JSON.stringify(config, null, '\t') + '\n');
}

/**
 * Resolve the catalog location for a config.
 */
export function resolveCatalogPath(config: RunwayConfig): string {
	return config.catalog.path ?? getCatalogPath();
}
