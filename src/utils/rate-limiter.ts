/**
 * Serializes calls and keeps at least `minIntervalMs` between the start of
 * consecutive calls. Used to stay within the request limits of the
 * Last.fm and MusicBrainz web services.
 */
export class RateLimiter {
	private lastStart = 0;
	private queue: Promise<void> = Promise.resolve();

	constructor(private readonly minIntervalMs: number) {
		if (minIntervalMs < 0) {
			throw new Error("RateLimiter interval must not be negative.");
		}
	}

	async schedule<T>(fn: () => Promise<T>): Promise<T> {
		const turn = this.queue.then(() => this.waitForSlot());
		// The next caller waits for this slot, not for fn() to settle.
		this.queue = turn;
		await turn;
		return fn();
	}

	private async waitForSlot(): Promise<void> {
		const wait = this.lastStart + this.minIntervalMs - Date.now();
		if (wait > 0) {
			await new Promise((resolve) => setTimeout(resolve, wait));
		}
		this.lastStart = Date.now();
	}
}
