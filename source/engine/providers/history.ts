/**
 * HistoryProvider - Previously launched commands matching the query.
 */

import type {HistoryStore} from '../history/store.js';
import type {HistoryTargetResolver} from '../history/targets.js';
import {DEFAULT_HISTORY_CONFIG, type HistoryConfig} from '../lib/config.js';
import type {SearchQuery} from '../search/query.js';
import type {ProviderResult, SearchProvider, SearchResult} from '../search/types.js';
import {DEFAULT_DEPRECATION_PENALTY} from './catalog.js';

export type HistoryScoring = Pick<
	HistoryConfig,
	'fuzzyLimit' | 'baseScore' | 'recencyStep' | 'exactFloor' | 'pruneWindow'
>;

export interface HistoryProviderOptions {
	scoring?: Partial<HistoryScoring>;
	deprecationPenalty?: number;
}

/**
 * True when a resolved target is, or was installed from, a deprecated
 * catalog package.
 */
function resolvesToDeprecatedPackage(resolved: SearchResult | undefined): boolean {
	if (resolved?.kind === 'catalog') return resolved.entry.deprecated;
	if (resolved?.kind === 'installed') return resolved.catalogRef?.deprecated === true;
	return false;
}

export class HistoryProvider implements SearchProvider {
	readonly source = 'history' as const;
	private readonly scoring: HistoryScoring;
	private readonly penalty: number;

	constructor(
		private readonly store: HistoryStore,
		private readonly resolver: HistoryTargetResolver,
		options: HistoryProviderOptions = {},
	) {
		this.scoring = {...DEFAULT_HISTORY_CONFIG, ...options.scoring};
		this.penalty = options.deprecationPenalty ?? DEFAULT_DEPRECATION_PENALTY;
	}

	async search(query: SearchQuery): Promise<ProviderResult[]> {
		if (query.isEmpty) return [];

		const {fuzzyLimit, baseScore, recencyStep, exactFloor, pruneWindow} =
			this.scoring;
		const matches = this.store.fuzzyMatches(query.trimmed, fuzzyLimit);

		const seen = new Set<string>();
		const candidates: ProviderResult[] = [];
		matches.forEach((match, rank) => {
			const key = match.entry.command.toLowerCase();
			if (seen.has(key)) return;
			seen.add(key);

			let score =
				baseScore + Math.max(0, (fuzzyLimit - rank) * recencyStep) + match.score;
			if (key === query.lowercased) score = Math.max(score, exactFloor);

			const result = this.resolver.toResult(match.entry, false);
			if (resolvesToDeprecatedPackage(result.resolved)) {
				score = Math.max(score - this.penalty, 0);
			}

			candidates.push({source: 'history', result, score});
		});

		if (candidates.length === 0) return [];
		const best = Math.max(...candidates.map(candidate => candidate.score));
		return candidates.filter(candidate => candidate.score >= best - pruneWindow);
	}
}
