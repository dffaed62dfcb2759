/**
 * InstalledProgramsProvider - Candidates from the OS program index.
 *
 * The index is queried with a subsequence wildcard of the query so that
 * loose spellings still reach the scorer. Records are then scored on their
 * name, system and embedded programs are filtered unless the query clearly
 * targets them, and each survivor is cross-referenced with the catalog.
 */

import os from 'node:os';
import path from 'node:path';
import pLimit, {type LimitFunction} from 'p-limit';
import type {CatalogStore} from '../catalog/store.js';
import type {CatalogEntry} from '../catalog/types.js';
import {isAbortError} from '../lib/abort.js';
import {errorMessage} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {ProgramIndex, ProgramRecord} from '../programs/program-index.js';
import {isEditDistanceLeOne, tokenize, wildcardPattern} from '../search/fuzzy.js';
import type {SearchQuery} from '../search/query.js';
import type {
	InstalledProgramResult,
	ProviderContext,
	ProviderResult,
	SearchProvider,
} from '../search/types.js';

export const INSTALLED_SCORE = {
	exact: 1000,
	token: 950,
	prefix: 900,
	tokenPrefix: 880,
	substring: 800,
	fallback: 100,
} as const;

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score a program name against the lowercased query.
 *
 * Checks run in order: exact, prefix, whole token, token prefix, substring.
 */
export function scoreInstalledName(name: string, lowercasedQuery: string): number {
	const lower = name.toLowerCase();
	if (lower === lowercasedQuery) return INSTALLED_SCORE.exact;
	if (lower.startsWith(lowercasedQuery)) return INSTALLED_SCORE.prefix;

	const tokens = tokenize(lower);
	if (tokens.includes(lowercasedQuery)) return INSTALLED_SCORE.token;
	if (tokens.some(token => token.startsWith(lowercasedQuery))) {
		return INSTALLED_SCORE.tokenPrefix;
	}

	if (lower.includes(lowercasedQuery)) return INSTALLED_SCORE.substring;
	return INSTALLED_SCORE.fallback;
}

// ============================================================================
// System / embedded filter
// ============================================================================

const DATA_VOLUME_PREFIX = '/system/volumes/data';

function collapseDataVolume(lowerPath: string): string {
	if (!lowerPath.startsWith(DATA_VOLUME_PREFIX)) return lowerPath;
	const remainder = lowerPath.slice(DATA_VOLUME_PREFIX.length);
	if (!remainder) return '/';
	return remainder.startsWith('/') ? remainder : `/${remainder}`;
}

/**
 * True for programs shipped with the OS, living in a Library folder, or
 * nested inside another application bundle.
 */
export function isSystemOrEmbeddedPath(programPath: string, homeDir: string): boolean {
	const normalized = collapseDataVolume(programPath.toLowerCase());

	if (normalized.startsWith('/system/applications/')) return true;
	if (normalized.startsWith('/system/library/')) return true;
	if (normalized.startsWith('/system/') && !normalized.startsWith('/system/volumes/')) {
		return true;
	}
	if (normalized.startsWith('/library/')) return true;

	const homeLibrary = collapseDataVolume(
		`${homeDir.replace(/\/+$/, '')}/library/`.toLowerCase(),
	);
	if (normalized.startsWith(homeLibrary)) return true;

	const components = normalized.split('/').filter(part => part.length > 0);
	return components.slice(0, -1).some(part => part.endsWith('.app'));
}

/**
 * Whether a system or embedded program is specific enough to show.
 */
export function keepsSystemProgram(
	name: string,
	score: number,
	lowercasedQuery: string,
	minQueryLength: number,
): boolean {
	if (score >= INSTALLED_SCORE.exact) return true;
	if (Array.from(lowercasedQuery).length < minQueryLength) return false;

	const lower = name.toLowerCase();
	return lower.startsWith(lowercasedQuery) || isEditDistanceLeOne(lower, lowercasedQuery);
}

// ============================================================================
// Provider
// ============================================================================

export interface InstalledProviderOptions {
	index: ProgramIndex;
	catalog: CatalogStore;
	/** Cap on records requested from the index */
	metadataLimit: number;
	minSystemQueryLength: number;
	queryConcurrency: number;
	homeDir?: string;
	logger?: Logger;
}

export class InstalledProgramsProvider implements SearchProvider {
	readonly source = 'installed' as const;

	private readonly index: ProgramIndex;
	private readonly catalog: CatalogStore;
	private readonly metadataLimit: number;
	private readonly minSystemQueryLength: number;
	private readonly homeDir: string;
	private readonly logger: Logger;
	private readonly limit: LimitFunction;

	constructor(options: InstalledProviderOptions) {
		this.index = options.index;
		this.catalog = options.catalog;
		this.metadataLimit = options.metadataLimit;
		this.minSystemQueryLength = options.minSystemQueryLength;
		this.homeDir = options.homeDir ?? os.homedir();
		this.logger = options.logger ?? createNullLogger();
		this.limit = pLimit(options.queryConcurrency);
	}

	async search(query: SearchQuery, context: ProviderContext): Promise<ProviderResult[]> {
		if (query.isEmpty) return [];

		let records: ProgramRecord[];
		try {
			records = await this.limit(() =>
				this.index.query(wildcardPattern(query.lowercased), {
					limit: this.metadataLimit,
					signal: context.signal,
				}),
			);
		} catch (error) {
			if (isAbortError(error)) {
				this.logger.debug('InstalledProvider', 'Program index query cancelled', {
					generation: context.generation,
				});
			} else {
				this.logger.warn('InstalledProvider', 'Program index query failed', {
					generation: context.generation,
					error: errorMessage(error),
				});
			}
			return [];
		}

		return this.scoreAndFilter(records.slice(0, this.metadataLimit), query.lowercased);
	}

	private scoreAndFilter(records: ProgramRecord[], lowercasedQuery: string): ProviderResult[] {
		const results: ProviderResult[] = [];

		for (const record of records) {
			const score = scoreInstalledName(record.name, lowercasedQuery);
			if (
				record.path !== undefined &&
				isSystemOrEmbeddedPath(record.path, this.homeDir) &&
				!keepsSystemProgram(record.name, score, lowercasedQuery, this.minSystemQueryLength)
			) {
				continue;
			}

			results.push({source: 'installed', result: this.toResult(record), score});
		}

		return results;
	}

	private toResult(record: ProgramRecord): InstalledProgramResult {
		const result: InstalledProgramResult = {kind: 'installed', name: record.name};
		if (record.path) result.path = record.path;
		if (record.bundleId) result.bundleId = record.bundleId;

		const catalogRef = this.matchCatalog(record);
		const description = record.description ?? catalogRef?.description;
		if (description) result.description = description;
		if (catalogRef) result.catalogRef = catalogRef;
		return result;
	}

	private matchCatalog(record: ProgramRecord): CatalogEntry | undefined {
		const byName = this.catalog.lookupByNameOrToken(record.name);
		if (byName) return byName;
		if (!record.path) return undefined;

		const filename = path.basename(record.path);
		return (
			this.catalog.lookupByProvidedFilename(filename) ??
			this.catalog.lookupByNameOrToken(path.basename(filename, path.extname(filename)))
		);
	}
}
