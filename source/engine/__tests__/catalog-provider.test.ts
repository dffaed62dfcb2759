import {describe, it, expect} from 'vitest';
import {CatalogStore} from '../catalog/store.js';
import {
	applyDeprecationPenalty,
	CatalogProvider,
	catalogEntryMatches,
	scoreCatalogEntry,
} from '../providers/catalog.js';
import {SearchQuery} from '../search/query.js';
import {catalogEntry} from './helpers.js';

const firefox = catalogEntry({
	token: 'firefox',
	displayNames: ['Mozilla Firefox', 'Firefox'],
	description: 'Web browser',
});

const alpha = catalogEntry({
	token: 'alpha-app',
	fullToken: 'acme/tap/alpha-app',
	displayNames: ['Alpha', 'Beta Tool'],
	description: 'A tool for testing',
});

describe('scoreCatalogEntry', () => {
	it('scores the display name and token first', () => {
		expect(scoreCatalogEntry(firefox, 'firefox')).toBe(1000);
		expect(scoreCatalogEntry(firefox, 'mozilla')).toBe(900);
		expect(scoreCatalogEntry(firefox, 'fire')).toBe(900);
		expect(scoreCatalogEntry(firefox, 'zilla')).toBe(800);
	});

	it('falls through to name variants and the description', () => {
		expect(scoreCatalogEntry(alpha, 'beta tool')).toBe(950);
		expect(scoreCatalogEntry(alpha, 'beta')).toBe(850);
		expect(scoreCatalogEntry(alpha, 'ta to')).toBe(750);
		expect(scoreCatalogEntry(alpha, 'testing')).toBe(500);
		expect(scoreCatalogEntry(alpha, 'acme')).toBe(100);
	});
});

describe('catalogEntryMatches', () => {
	it('matches any searchable term as a substring', () => {
		expect(catalogEntryMatches(alpha, 'acme/tap')).toBe(true);
		expect(catalogEntryMatches(alpha, 'for test')).toBe(true);
		expect(catalogEntryMatches(alpha, 'gamma')).toBe(false);
	});
});

describe('applyDeprecationPenalty', () => {
	it('subtracts the penalty from deprecated entries, floored at zero', () => {
		const deprecated = {...firefox, deprecated: true};

		expect(applyDeprecationPenalty(deprecated, 900)).toBe(700);
		expect(applyDeprecationPenalty(deprecated, 100)).toBe(0);
		expect(applyDeprecationPenalty(firefox, 900)).toBe(900);
		expect(applyDeprecationPenalty(deprecated, 900, 50)).toBe(850);
	});
});

describe('CatalogProvider', () => {
	it('returns scored matches in catalog order', async () => {
		const provider = new CatalogProvider(new CatalogStore([firefox, alpha]));

		const results = await provider.search(new SearchQuery('Fire'));

		expect(results).toEqual([
			{source: 'catalog', score: 900, result: {kind: 'catalog', entry: firefox}},
		]);
	});

	it('drops deprecated entries whose score reaches zero', async () => {
		const legacy = catalogEntry({
			token: 'legacy-tool',
			fullToken: 'acme/legacy-tool',
			deprecated: true,
		});
		const provider = new CatalogProvider(new CatalogStore([legacy]));

		// Only the full token matches: 100 - 200 -> 0
		expect(await provider.search(new SearchQuery('acme/'))).toEqual([]);
		const byToken = await provider.search(new SearchQuery('legacy'));
		expect(byToken.map(result => result.score)).toEqual([700]);
	});

	it('returns nothing for an empty query', async () => {
		const provider = new CatalogProvider(new CatalogStore([firefox]));
		expect(await provider.search(new SearchQuery(''))).toEqual([]);
	});
});
