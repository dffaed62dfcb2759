import {describe, it, expect} from 'vitest';
import {
	foldForMatching,
	isEditDistanceLeOne,
	matchesWildcard,
	tokenize,
	wildcardPattern,
	wildcardToRegExp,
} from '../search/fuzzy.js';
import {SearchQuery} from '../search/query.js';

describe('SearchQuery', () => {
	it('trims and lowercases the raw input', () => {
		const query = new SearchQuery('  Visual Studio ');
		expect(query.raw).toBe('  Visual Studio ');
		expect(query.trimmed).toBe('Visual Studio');
		expect(query.lowercased).toBe('visual studio');
		expect(query.isEmpty).toBe(false);
	});

	it('is empty for whitespace-only input', () => {
		expect(new SearchQuery(' \t\n').isEmpty).toBe(true);
		expect(new SearchQuery('').isEmpty).toBe(true);
	});
});

describe('wildcardPattern', () => {
	it('matches everything for an empty query', () => {
		expect(wildcardPattern('')).toBe('*');
	});

	it('interleaves wildcards between glyphs', () => {
		expect(wildcardPattern('abc')).toBe('*a*b*c*');
	});
});

describe('wildcard matching', () => {
	it('anchors the pattern and expands * and ?', () => {
		expect(wildcardToRegExp('c?lc*').source).toBe('^c.lc.*$');
		expect(matchesWildcard('Calculator', 'c?lc*')).toBe(true);
		expect(matchesWildcard('Calculator', 'alc*')).toBe(false);
	});

	it('is case and diacritic insensitive', () => {
		expect(foldForMatching('Café')).toBe('cafe');
		expect(matchesWildcard('CAFÉ', '*cafe*')).toBe(true);
	});

	it('matches subsequence patterns', () => {
		const pattern = wildcardPattern('vsc');
		expect(matchesWildcard('Visual Studio Code', pattern)).toBe(true);
		expect(matchesWildcard('Notes', pattern)).toBe(false);
	});

	it('treats regex metacharacters literally', () => {
		expect(matchesWildcard('a+b', 'a+b')).toBe(true);
		expect(matchesWildcard('aab', 'a+b')).toBe(false);
	});
});

describe('tokenize', () => {
	it('splits on non-alphanumeric boundaries', () => {
		expect(tokenize('Visual Studio Code')).toEqual(['visual', 'studio', 'code']);
		expect(tokenize('  --foo_bar 2x ')).toEqual(['foo', 'bar', '2x']);
	});

	it('returns no tokens for punctuation only', () => {
		expect(tokenize('-- //')).toEqual([]);
	});
});

describe('isEditDistanceLeOne', () => {
	it('accepts identical strings and single edits', () => {
		expect(isEditDistanceLeOne('code', 'code')).toBe(true);
		expect(isEditDistanceLeOne('code', 'cods')).toBe(true);
		expect(isEditDistanceLeOne('chrome', 'chromes')).toBe(true);
		expect(isEditDistanceLeOne('safari', 'safri')).toBe(true);
		expect(isEditDistanceLeOne('', 'a')).toBe(true);
	});

	it('rejects transpositions', () => {
		expect(isEditDistanceLeOne('warp', 'wrap')).toBe(false);
	});

	it('rejects length differences above one', () => {
		expect(isEditDistanceLeOne('abc', 'abcde')).toBe(false);
	});

	it('rejects two substitutions', () => {
		expect(isEditDistanceLeOne('finder', 'fimdor')).toBe(false);
	});
});
