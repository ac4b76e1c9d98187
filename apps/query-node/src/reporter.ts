/**
 * Periodic metrics log for operators
 */

import logger, { type Logger } from "@beacon/logger";
import type { MetricsReader, MetricsSnapshot } from "@beacon/query";

export interface ReporterOptions {
	intervalMs: number;
	log?: Pick<Logger, "info">;
}

export function summarize(current: MetricsSnapshot, previous: MetricsSnapshot | null) {
	const { capturedAt, handlingTimeCount, handlingTimeTotalMs, ...counters } = current;
	const avgHandlingMs = handlingTimeCount > 0 ? handlingTimeTotalMs / handlingTimeCount : 0;
	return {
		...counters,
		requestsSinceLast: current.requestsReceived - (previous?.requestsReceived ?? 0),
		avgHandlingMs: Math.round(avgHandlingMs * 1000) / 1000,
		windowMs: previous ? capturedAt - previous.capturedAt : null,
	};
}

/**
 * Log a metrics snapshot every `intervalMs`. Returns a stop function.
 */
export function startMetricsReporter(metrics: MetricsReader, options: ReporterOptions): () => void {
	const log = options.log ?? logger.child({ module: "metrics" });
	let previous: MetricsSnapshot | null = null;

	const report = () => {
		const current = metrics.snapshot();
		log.info(summarize(current, previous), "Query metrics");
		previous = current;
	};

	const interval = setInterval(report, options.intervalMs);

	return () => {
		clearInterval(interval);
	};
}
