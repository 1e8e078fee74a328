/** A half-open range [from, to) of Unix seconds. */
export interface TimeSpan {
	from: number;
	to: number;
}

/**
 * Merge overlapping or touching spans. Empty spans are dropped.
 */
export function mergeSpans(spans: TimeSpan[]): TimeSpan[] {
	const sorted = spans.filter((span) => span.to > span.from).sort((a, b) => a.from - b.from || a.to - b.to);

	const merged: TimeSpan[] = [];
	for (const span of sorted) {
		const last = merged[merged.length - 1];
		if (last && span.from <= last.to) {
			last.to = Math.max(last.to, span.to);
		} else {
			merged.push({ ...span });
		}
	}
	return merged;
}

/**
 * The parts of [0, until) that no archived span covers, oldest first.
 */
export function computeMissingTimeSpans(covered: TimeSpan[], until: number): TimeSpan[] {
	const missing: TimeSpan[] = [];
	let cursor = 0;

	for (const span of mergeSpans(covered)) {
		if (span.from >= until) break;
		if (span.from > cursor) {
			missing.push({ from: cursor, to: span.from });
		}
		cursor = Math.max(cursor, span.to);
	}

	if (cursor < until) {
		missing.push({ from: cursor, to: until });
	}
	return missing;
}
