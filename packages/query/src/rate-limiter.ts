/**
 * Per-peer token bucket.
 *
 * Each peer address gets `burst` tokens that refill at `perSecond`. Tracking is
 * capped at `maxPeers`; the least recently seen peer is forgotten first.
 */

export interface RateLimitOptions {
	perSecond: number;
	burst: number;
	maxPeers?: number;
	/** Clock in milliseconds, injectable for tests */
	now?: () => number;
}

interface Bucket {
	tokens: number;
	updatedAt: number;
}

const DEFAULT_MAX_PEERS = 4096;

export class PeerRateLimiter {
	private readonly buckets = new Map<string, Bucket>();
	private readonly perSecond: number;
	private readonly burst: number;
	private readonly maxPeers: number;
	private readonly now: () => number;

	constructor(options: RateLimitOptions) {
		if (!(options.perSecond > 0) || !(options.burst >= 1)) {
			throw new RangeError("Rate limit needs perSecond > 0 and burst >= 1");
		}
		this.perSecond = options.perSecond;
		this.burst = options.burst;
		this.maxPeers = Math.max(1, options.maxPeers ?? DEFAULT_MAX_PEERS);
		this.now = options.now ?? Date.now;
	}

	get trackedPeers(): number {
		return this.buckets.size;
	}

	/**
	 * Spend one token for `address`. Returns false when the peer is over its limit.
	 */
	take(address: string): boolean {
		const now = this.now();
		const existing = this.buckets.get(address);
		let bucket: Bucket;

		if (existing) {
			const elapsedSeconds = Math.max(0, now - existing.updatedAt) / 1000;
			bucket = {
				tokens: Math.min(this.burst, existing.tokens + elapsedSeconds * this.perSecond),
				updatedAt: now,
			};
			// Re-insert to keep Map order = least recently seen first
			this.buckets.delete(address);
		} else {
			bucket = { tokens: this.burst, updatedAt: now };
			this.evictIfFull();
		}

		const allowed = bucket.tokens >= 1;
		if (allowed) {
			bucket.tokens -= 1;
		}
		this.buckets.set(address, bucket);
		return allowed;
	}

	private evictIfFull(): void {
		while (this.buckets.size >= this.maxPeers) {
			const oldest = this.buckets.keys().next();
			if (oldest.done) {
				return;
			}
			this.buckets.delete(oldest.value);
		}
	}
}
