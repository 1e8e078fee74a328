import anyAscii from "any-ascii";

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Transliterate a string to printable ASCII ("Борис" -> "Boris").
 * Characters without an ASCII counterpart become `tofu`.
 */
export function toAscii(value: string, tofu: string = "_"): string {
	let result = "";
	for (const char of value.normalize("NFC")) {
		if (/^[\x20-\x7e]$/.test(char)) {
			result += char;
			continue;
		}
		if (/^\p{M}$/u.test(char)) continue;

		const mapped = anyAscii(char).replace(/[^\x20-\x7e]/g, "");
		result += mapped.length > 0 ? mapped : tofu;
	}
	return result;
}

/**
 * Title case: first letter of every alphabetic run upper case,
 * the rest lower case ("hip-hop" -> "Hip-Hop", "80s" -> "80S").
 */
export function toTitleCase(value: string): string {
	return value
		.toLowerCase()
		.replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function roundTo(value: number, decimals: number): number {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
}

export function percentage(part: number, total: number): number {
	if (total === 0) return 0;
	return roundTo((part / total) * 100, 1);
}

/**
 * Build a stable cache key from a tuple of optional strings.
 */
export function cacheKey(...parts: Array<string | undefined>): string {
	return JSON.stringify(parts.map((part) => part ?? null));
}
