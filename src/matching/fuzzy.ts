import * as fuzz from "fuzzball";

export type Scorer = (query: string, choice: string) => number;

export interface ExtractResult {
	choice: string;
	score: number;
	index: number;
}

// Unicode-aware variants: non-ASCII characters take part in the comparison.
const UNICODE = { force_ascii: false, full_process: true };

export const ratio: Scorer = (query, choice) => fuzz.ratio(query, choice, UNICODE);

export const weightedRatio: Scorer = (query, choice) => fuzz.WRatio(query, choice, UNICODE);

export const partialRatio: Scorer = (query, choice) => fuzz.partial_ratio(query, choice, UNICODE);

/**
 * Find the best scoring choice. On ties the earliest choice wins;
 * nothing scoring below `cutoff` is returned.
 */
export function extractOne(
	query: string,
	choices: readonly string[],
	scorer: Scorer,
	cutoff = 0
): ExtractResult | null {
	let best: ExtractResult | null = null;

	for (const [index, choice] of choices.entries()) {
		const score = scorer(query, choice);
		if (score < cutoff) continue;
		if (best === null || score > best.score) {
			best = { choice, score, index };
		}
	}

	return best;
}
