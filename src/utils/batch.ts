/**
 * Run `processor` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function processInBatches<T, R>(
	items: readonly T[],
	concurrency: number,
	processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
	const results: R[] = new Array<R>(items.length);
	let next = 0;

	async function worker(): Promise<void> {
		while (next < items.length) {
			const index = next++;
			results[index] = await processor(items[index], index);
		}
	}

	const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
	await Promise.all(workers);
	return results;
}
