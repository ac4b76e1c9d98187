/**
 * Responder metrics.
 *
 * Counters only ever grow. Handlers on the event loop each run an increment to
 * completion, so concurrent requests never lose updates. Readers get copies.
 */

export const COUNTERS = [
	"requestsReceived",
	"responsesSent",
	"decodeErrors",
	"encodeErrors",
	"sendErrors",
	"sendTimeouts",
	"dropped",
	"rateLimited",
] as const;

export type CounterName = (typeof COUNTERS)[number];

export type MetricsSnapshot = Record<CounterName, number> & {
	handlingTimeCount: number;
	handlingTimeTotalMs: number;
	handlingTimeMaxMs: number;
	capturedAt: number;
};

/**
 * Operator-facing view of the metrics
 */
export interface MetricsReader {
	snapshot(): MetricsSnapshot;
}

function zeroCounters(): Record<CounterName, number> {
	return {
		requestsReceived: 0,
		responsesSent: 0,
		decodeErrors: 0,
		encodeErrors: 0,
		sendErrors: 0,
		sendTimeouts: 0,
		dropped: 0,
		rateLimited: 0,
	};
}

export class QueryMetrics implements MetricsReader {
	private readonly counters = zeroCounters();
	private handlingTimeCount = 0;
	private handlingTimeTotalMs = 0;
	private handlingTimeMaxMs = 0;

	increment(name: CounterName, by = 1): void {
		if (!Number.isSafeInteger(by) || by < 0) {
			throw new RangeError(`Counter ${name} can only grow by a non-negative integer, got ${by}`);
		}
		this.counters[name] += by;
	}

	recordHandlingTime(ms: number): void {
		if (!Number.isFinite(ms) || ms < 0) {
			return;
		}
		this.handlingTimeCount++;
		this.handlingTimeTotalMs += ms;
		if (ms > this.handlingTimeMaxMs) {
			this.handlingTimeMaxMs = ms;
		}
	}

	snapshot(): MetricsSnapshot {
		return {
			...this.counters,
			handlingTimeCount: this.handlingTimeCount,
			handlingTimeTotalMs: this.handlingTimeTotalMs,
			handlingTimeMaxMs: this.handlingTimeMaxMs,
			capturedAt: Date.now(),
		};
	}
}
