/**
 * Fuzzy scoring of remembered commands against a query.
 *
 * Four tiers with disjoint score bands, so a better tier always wins:
 *
 *   exact        300
 *   prefix       260
 *   substring    190 + max(0, 60 - offset)          -> 190..249 (offset >= 1)
 *   subsequence  100 + min(89, sum(max(1, 15 - gap))) -> 101..189
 *
 * A query whose characters cannot all be found in order is not a match.
 */

export const HISTORY_SCORE = {
	exact: 300,
	prefix: 260,
	substringBase: 190,
	proximityWindow: 60,
	subsequenceBase: 100,
	subsequenceCeiling: 89,
	adjacency: 15,
} as const;

/**
 * Score `candidate` against an already lowercased, non-empty query.
 * Returns null when the candidate does not match at all.
 */
export function fuzzyScore(
	candidate: string,
	lowercasedQuery: string,
): number | null {
	const text = candidate.toLowerCase();

	if (text === lowercasedQuery) return HISTORY_SCORE.exact;
	if (text.startsWith(lowercasedQuery)) return HISTORY_SCORE.prefix;

	const index = text.indexOf(lowercasedQuery);
	if (index >= 0) {
		// Offsets count code points, as the subsequence gaps do
		const offset = Array.from(text.slice(0, index)).length;
		const proximity = Math.max(0, HISTORY_SCORE.proximityWindow - offset);
		return HISTORY_SCORE.substringBase + proximity;
	}

	const chars = Array.from(text);
	let position = 0;
	let total = 0;
	for (const queryChar of lowercasedQuery) {
		const found = chars.indexOf(queryChar, position);
		if (found === -1) return null;

		const gap = found - position;
		total += Math.max(HISTORY_SCORE.adjacency - gap, 1);
		position = found + 1;
	}

	return (
		HISTORY_SCORE.subsequenceBase +
		Math.min(HISTORY_SCORE.subsequenceCeiling, total)
	);
}
