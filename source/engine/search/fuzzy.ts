/**
 * Lexical helpers shared by the providers and the program index.
 *
 * Everything here is pure: the same inputs always produce the same output.
 */

/**
 * Build a glyph-interleaved wildcard for subsequence lookups against indices
 * that only understand `*` wildcards.
 *
 * @example wildcardPattern('abc') // '*a*b*c*'
 */
export function wildcardPattern(lowercasedQuery: string): string {
	if (lowercasedQuery.length === 0) {
		return '*';
	}
	return `*${Array.from(lowercasedQuery).join('*')}*`;
}

/**
 * Fold case and strip combining marks so `É` and `e` compare equal.
 */
export function foldForMatching(text: string): string {
	return text.normalize('NFD').replace(/\p{M}+/gu, '').toLowerCase();
}

function escapeRegExp(text: string): string {
	return text.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a `*`/`?` wildcard into an anchored, case- and
 * diacritic-insensitive matcher over folded text.
 */
export function wildcardToRegExp(pattern: string): RegExp {
	const body = Array.from(foldForMatching(pattern))
		.map(char => {
			if (char === '*') return '.*';
			if (char === '?') return '.';
			return escapeRegExp(char);
		})
		.join('');
	return new RegExp(`^${body}$`, 'su');
}

/**
 * LIKE[cd]-style wildcard test.
 */
export function matchesWildcard(text: string, pattern: string | RegExp): boolean {
	const matcher =
		typeof pattern === 'string' ? wildcardToRegExp(pattern) : pattern;
	return matcher.test(foldForMatching(text));
}

/**
 * Split on non-alphanumeric boundaries into non-empty lowercase tokens.
 *
 * @example tokenize('Visual Studio Code') // ['visual', 'studio', 'code']
 */
export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.split(/[^\p{L}\p{N}]+/u)
		.filter(token => token.length > 0);
}

/**
 * True iff `a` and `b` are equal or one substitution, insertion or deletion
 * apart. A transposition counts as two substitutions.
 */
export function isEditDistanceLeOne(a: string, b: string): boolean {
	if (a === b) return true;

	const left = Array.from(a);
	const right = Array.from(b);
	const la = left.length;
	const lb = right.length;
	if (Math.abs(la - lb) > 1) return false;

	let i = 0;
	let j = 0;
	let diffs = 0;
	while (i < la && j < lb) {
		if (left[i] === right[j]) {
			i += 1;
			j += 1;
			continue;
		}

		diffs += 1;
		if (diffs > 1) return false;

		if (la === lb) {
			i += 1;
			j += 1;
		} else if (la > lb) {
			i += 1;
		} else {
			j += 1;
		}
	}

	if (i < la || j < lb) diffs += 1;
	return diffs <= 1;
}
