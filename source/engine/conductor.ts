/**
 * SearchConductor - Fans a query out to every provider, re-ranks the union
 * and delivers one ordered list.
 *
 * Each call to `search` takes a new generation. A search whose generation is
 * no longer current when its providers finish, or when its delivery task
 * runs, is discarded without invoking the completion callback. The previous
 * search's abort signal fires as soon as a newer one starts.
 */

import type {HistoryStore} from './history/store.js';
import type {HistoryTargetResolver} from './history/targets.js';
import {createAbortError, isAbortError, withTimeout} from './lib/abort.js';
import {errorMessage} from './lib/errors.js';
import {createNullLogger, type Logger} from './lib/logger.js';
import {catalogDisplayName} from './catalog/types.js';
import {SearchQuery} from './search/query.js';
import {displayName, identityKey} from './search/results.js';
import type {
	ProviderContext,
	ProviderResult,
	SearchProvider,
	SearchResult,
} from './search/types.js';

// ============================================================================
// Types
// ============================================================================

export type SearchOutcome =
	| {status: 'delivered'; generation: number; results: SearchResult[]}
	| {status: 'superseded'; generation: number};

export type SearchCompletion = (results: SearchResult[]) => void;

/** Runs a delivery task, e.g. on the UI's next tick */
export type DeliveryScheduler = (task: () => void) => void;

/** Receives the final score of every ranked result, keyed by identity key */
export type ScoreObserver = (scores: Map<string, number>) => void;

/**
 * Detects URLs and paths in the query. Its results are pinned ahead of
 * provider results.
 */
export interface QueryClassification {
	classify(query: SearchQuery): Promise<SearchResult[]>;
}

export interface ConductorOptions {
	providers: SearchProvider[];
	history: HistoryStore;
	resolver: HistoryTargetResolver;
	classifier?: QueryClassification;
	/** History entries shown for an empty query (default: 8) */
	recentLimit?: number;
	/** Per-provider deadline in ms; 0 disables it */
	providerTimeoutMs?: number;
	deliver?: DeliveryScheduler;
	onScores?: ScoreObserver;
	logger?: Logger;
}

export const DEFAULT_RECENT_LIMIT = 8;

const defaultDeliver: DeliveryScheduler = task => {
	setImmediate(task);
};

// ============================================================================
// Ranking
// ============================================================================

/**
 * Priority tier of a candidate; higher tiers always sort first.
 */
export function priorityFor(candidate: ProviderResult, query: SearchQuery): number {
	const result = candidate.result;
	switch (result.kind) {
		case 'installed':
			return result.name.toLowerCase() === query.lowercased ? 5 : 3;
		case 'history':
			return result.command.toLowerCase() === query.lowercased ? 4 : 3;
		case 'catalog': {
			const entry = result.entry;
			const exact =
				catalogDisplayName(entry).toLowerCase() === query.lowercased ||
				entry.token.toLowerCase() === query.lowercased ||
				entry.fullToken.toLowerCase() === query.lowercased;
			return exact ? 3 : 1;
		}
		case 'url':
		case 'filesystem':
			return 1;
	}
}

function basename(filePath: string): string {
	const parts = filePath.split(/[\\/]/).filter(part => part.length > 0);
	return parts[parts.length - 1] ?? filePath;
}

export interface RankedResults {
	results: SearchResult[];
	scores: Map<string, number>;
}

/**
 * Merge, order and deduplicate provider candidates.
 *
 * 1. Catalog entries providing an installed program's bundle are dropped.
 * 2. A history entry whose recorded display name equals an installed
 *    program's name is folded into that program, adding its score.
 * 3. Candidates sort by tier, then score, then display name.
 * 4. The first candidate per identity key wins, and non-history candidates
 *    repeating an already shown display name are dropped. A suppressed
 *    candidate still marks its identity key as seen.
 */
export function rerank(candidates: ProviderResult[], query: SearchQuery): RankedResults {
	const installed: ProviderResult[] = [];
	const catalog: ProviderResult[] = [];
	const history: ProviderResult[] = [];
	const installedFilenames = new Set<string>();
	const installedIndexByDisplay = new Map<string, number>();

	for (const candidate of candidates) {
		const result = candidate.result;
		switch (result.kind) {
			case 'installed':
				if (result.path) installedFilenames.add(basename(result.path).toLowerCase());
				installedIndexByDisplay.set(displayName(result).toLowerCase(), installed.length);
				installed.push(candidate);
				break;
			case 'catalog':
				catalog.push(candidate);
				break;
			case 'history':
				history.push(candidate);
				break;
			case 'url':
			case 'filesystem':
				break;
		}
	}

	const visibleCatalog = catalog.filter(candidate => {
		if (candidate.result.kind !== 'catalog') return true;
		return !candidate.result.entry.providedProgramFilenames.some(filename =>
			installedFilenames.has(filename.toLowerCase()),
		);
	});

	const unmergedHistory: ProviderResult[] = [];
	for (const candidate of history) {
		const result = candidate.result;
		const display = result.kind === 'history' ? result.display : undefined;
		const index = display ? installedIndexByDisplay.get(display.toLowerCase()) : undefined;
		const target = index === undefined ? undefined : installed[index];
		if (index !== undefined && target) {
			installed[index] = {...target, score: target.score + candidate.score};
			continue;
		}
		unmergedHistory.push(candidate);
	}

	const ordered = [...installed, ...unmergedHistory, ...visibleCatalog]
		.map(candidate => ({candidate, tier: priorityFor(candidate, query)}))
		.sort(
			(a, b) =>
				b.tier - a.tier ||
				b.candidate.score - a.candidate.score ||
				displayName(a.candidate.result)
					.toLowerCase()
					.localeCompare(displayName(b.candidate.result).toLowerCase()),
		);

	const seenIdentities = new Set<string>();
	const seenDisplayNames = new Set<string>();
	const results: SearchResult[] = [];
	const scores = new Map<string, number>();

	for (const {candidate} of ordered) {
		const identity = identityKey(candidate.result);
		if (seenIdentities.has(identity)) continue;
		seenIdentities.add(identity);

		const displayKey = displayName(candidate.result).toLowerCase();
		if (seenDisplayNames.has(displayKey) && candidate.result.kind !== 'history') {
			continue;
		}
		seenDisplayNames.add(displayKey);

		results.push(candidate.result);
		scores.set(identity, candidate.score);
	}

	return {results, scores};
}

/**
 * Put classifier results first and drop provider results they duplicate.
 */
export function pinResults(pinned: SearchResult[], ranked: SearchResult[]): SearchResult[] {
	const pinnedKeys = new Set<string>();
	const head: SearchResult[] = [];
	for (const result of pinned) {
		const key = identityKey(result);
		if (pinnedKeys.has(key)) continue;
		pinnedKeys.add(key);
		head.push(result);
	}
	return [...head, ...ranked.filter(result => !pinnedKeys.has(identityKey(result)))];
}

// ============================================================================
// Conductor
// ============================================================================

export class SearchConductor {
	private readonly providers: SearchProvider[];
	private readonly history: HistoryStore;
	private readonly resolver: HistoryTargetResolver;
	private readonly classifier: QueryClassification | null;
	private readonly recentLimit: number;
	private readonly providerTimeoutMs: number;
	private readonly deliver: DeliveryScheduler;
	private readonly onScores: ScoreObserver | null;
	private readonly logger: Logger;

	private generation = 0;
	private controller: AbortController | null = null;

	constructor(options: ConductorOptions) {
		this.providers = options.providers;
		this.history = options.history;
		this.resolver = options.resolver;
		this.classifier = options.classifier ?? null;
		this.recentLimit = options.recentLimit ?? DEFAULT_RECENT_LIMIT;
		this.providerTimeoutMs = options.providerTimeoutMs ?? 0;
		this.deliver = options.deliver ?? defaultDeliver;
		this.onScores = options.onScores ?? null;
		this.logger = options.logger ?? createNullLogger();
	}

	/** Generation of the most recent search */
	get currentGeneration(): number {
		return this.generation;
	}

	/**
	 * Run a search. `completion` is called at most once, and only if no newer
	 * search started before delivery.
	 */
	async search(raw: string, completion?: SearchCompletion): Promise<SearchOutcome> {
		const query = new SearchQuery(raw);
		const generation = this.nextGeneration();

		if (query.isEmpty) {
			this.abortInFlight('Superseded by a newer search');
			const recents = this.history
				.recentEntries(this.recentLimit)
				.map(entry => this.resolver.toResult(entry, true));
			this.onScores?.(new Map());
			return this.deliverResults(generation, recents, completion);
		}

		const signal = this.startSignal();
		const context: ProviderContext = {generation, signal};

		const [pinned, perProvider] = await Promise.all([
			this.runClassifier(query),
			Promise.all(
				this.providers.map(provider => this.runProvider(provider, query, context)),
			),
		]);

		if (!this.isCurrent(generation)) {
			this.logger.debug('SearchConductor', 'Discarded stale search', {generation});
			return {status: 'superseded', generation};
		}

		const ranked = rerank(perProvider.flat(), query);
		this.onScores?.(ranked.scores);
		return this.deliverResults(generation, pinResults(pinned, ranked.results), completion);
	}

	/**
	 * Abort any in-flight search and invalidate it.
	 */
	cancel(): void {
		this.nextGeneration();
		this.abortInFlight('Search cancelled');
	}

	private nextGeneration(): number {
		this.generation += 1;
		return this.generation;
	}

	private isCurrent(generation: number): boolean {
		return generation === this.generation;
	}

	private abortInFlight(reason: string): void {
		this.controller?.abort(createAbortError(reason));
		this.controller = null;
	}

	private startSignal(): AbortSignal {
		this.abortInFlight('Superseded by a newer search');
		const controller = new AbortController();
		this.controller = controller;
		return controller.signal;
	}

	private deliverResults(
		generation: number,
		results: SearchResult[],
		completion: SearchCompletion | undefined,
	): Promise<SearchOutcome> {
		return new Promise(resolve => {
			this.deliver(() => {
				if (!this.isCurrent(generation)) {
					this.logger.debug('SearchConductor', 'Discarded stale delivery', {generation});
					resolve({status: 'superseded', generation});
					return;
				}
				completion?.(results);
				resolve({status: 'delivered', generation, results});
			});
		});
	}

	private async runProvider(
		provider: SearchProvider,
		query: SearchQuery,
		context: ProviderContext,
	): Promise<ProviderResult[]> {
		try {
			return await withTimeout(
				Promise.resolve().then(() => provider.search(query, context)),
				this.providerTimeoutMs,
				`${provider.source} provider`,
			);
		} catch (error) {
			if (isAbortError(error)) {
				this.logger.debug('SearchConductor', 'Provider cancelled', {
					source: provider.source,
					generation: context.generation,
					reason: errorMessage(error),
				});
			} else {
				this.logger.warn('SearchConductor', 'Provider failed', {
					source: provider.source,
					generation: context.generation,
					error: errorMessage(error),
				});
			}
			return [];
		}
	}

	private async runClassifier(query: SearchQuery): Promise<SearchResult[]> {
		const classifier = this.classifier;
		if (!classifier) return [];
		try {
			return await withTimeout(
				Promise.resolve().then(() => classifier.classify(query)),
				this.providerTimeoutMs,
				'classifier',
			);
		} catch (error) {
			if (isAbortError(error)) {
				this.logger.debug('SearchConductor', 'Query classification cancelled', {
					reason: errorMessage(error),
				});
			} else {
				this.logger.warn('SearchConductor', 'Query classification failed', {
					error: errorMessage(error),
				});
			}
			return [];
		}
	}
}

// ============================================================================
// Debug scores
// ============================================================================

export interface ScoreRecorder {
	readonly observer: ScoreObserver;
	/** Score of a result in the most recent ranking */
	scoreFor(result: SearchResult): number | undefined;
}

export function createScoreRecorder(): ScoreRecorder {
	let latest = new Map<string, number>();
	return {
		observer: scores => {
			latest = scores;
		},
		scoreFor: result => latest.get(identityKey(result)),
	};
}
