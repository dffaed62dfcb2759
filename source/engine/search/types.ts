/**
 * Search types.
 *
 * Results are a closed, discriminated union. Per-variant behaviour (display
 * name, identity key, subtitle, primary action) lives in `results.ts` as
 * exhaustive switches.
 */

import type {CatalogEntry} from '../catalog/types.js';
import type {HistoryTarget} from '../history/types.js';
import type {SearchQuery} from './query.js';

export type InstalledProgramResult = {
	kind: 'installed';
	name: string;
	path?: string;
	bundleId?: string;
	description?: string;
	/** Catalog package that provides this program, when known */
	catalogRef?: CatalogEntry;
};

export type CatalogEntryResult = {
	kind: 'catalog';
	entry: CatalogEntry;
};

export type HistoryCommandResult = {
	kind: 'history';
	command: string;
	display?: string;
	subtitle?: string;
	/** True for rows produced by the empty-query recents view */
	isRecent: boolean;
	target?: HistoryTarget;
	/** The target re-resolved for this search, if it still resolves */
	resolved?: SearchResult;
};

export type UrlTargetResult = {
	kind: 'url';
	url: string;
};

export type FileSystemEntryResult = {
	kind: 'filesystem';
	path: string;
	isDirectory: boolean;
	displayOverride?: string;
};

export type SearchResult =
	| InstalledProgramResult
	| CatalogEntryResult
	| HistoryCommandResult
	| UrlTargetResult
	| FileSystemEntryResult;

export type SearchResultKind = SearchResult['kind'];

/**
 * Which provider produced a candidate.
 */
export type SearchSource = 'installed' | 'catalog' | 'history';

/**
 * Provider-scored result prior to conductor re-ranking.
 * Scores are source-local until the conductor applies priority tiers.
 */
export interface ProviderResult {
	source: SearchSource;
	result: SearchResult;
	score: number;
}

/**
 * Per-search context handed to providers.
 */
export interface ProviderContext {
	generation: number;
	/** Aborted once a newer search supersedes this one */
	signal: AbortSignal;
}

/**
 * An independent, concurrently queried source of candidates.
 *
 * Providers must resolve (never reject) with an empty list when their data
 * source fails; the conductor also guards against rejections.
 */
export interface SearchProvider {
	readonly source: SearchSource;
	search(query: SearchQuery, context: ProviderContext): Promise<ProviderResult[]>;
}
