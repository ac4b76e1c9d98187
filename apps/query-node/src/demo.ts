/**
 * Self-contained demo: serve a status record, query it, then hammer it a little
 * and print what the metrics saw.
 */

import logger from "@beacon/logger";
import {
	type PeerAddress,
	QueryMetrics,
	Requester,
	Responder,
	type ResponderOptions,
	type StatusRecord,
	StatusWatch,
	buildIdToString,
	statusRecordsEqual,
} from "@beacon/query";

const log = logger.child({ module: "demo" });

const FOLLOW_UP_QUERIES = 32;

export interface DemoOptions {
	address: PeerAddress;
	status: StatusRecord;
	timeoutMs: number;
	responder?: ResponderOptions;
}

export interface DemoResult {
	matched: boolean;
	roundTripMs: number;
	failures: number;
	metrics: ReturnType<QueryMetrics["snapshot"]>;
	elapsedMs: number;
}

// A wildcard bind is reached through loopback
function reachableAddress(address: string): string {
	if (address === "0.0.0.0") {
		return "127.0.0.1";
	}
	if (address === "::") {
		return "::1";
	}
	return address;
}

export async function runDemo(options: DemoOptions): Promise<DemoResult> {
	const watch = new StatusWatch(options.status);
	const metrics = new QueryMetrics();
	const responder = new Responder(options.address, watch, options.responder);
	const bound = await responder.listen();
	const controller = new AbortController();
	const running = responder.run(metrics, controller.signal);

	try {
		const requester = new Requester(
			{ address: reachableAddress(bound.address), port: bound.port },
			{ transports: options.responder?.transports }
		);

		const { status, roundTripMs } = await requester.status(options.timeoutMs);
		const matched = statusRecordsEqual(status, options.status);
		log.info({ roundTripMs: Number(roundTripMs.toFixed(3)) }, "Ping");
		log.info(
			{
				buildId: buildIdToString(status.buildId),
				playersCount: status.playersCount,
				playerCap: status.playerCap,
				battleMode: status.battleMode,
				matched,
			},
			"Server info"
		);

		const startedAt = performance.now();
		let failures = 0;
		for (let i = 0; i < FOLLOW_UP_QUERIES; i++) {
			try {
				await requester.status(options.timeoutMs);
			} catch (err) {
				failures++;
				log.error({ err }, "Server info request error");
			}
		}
		const elapsedMs = performance.now() - startedAt;

		const snapshot = metrics.snapshot();
		log.info({ metrics: snapshot, elapsedMs: Number(elapsedMs.toFixed(3)) }, "Demo finished");

		return { matched, roundTripMs, failures, metrics: snapshot, elapsedMs };
	} finally {
		controller.abort();
		await running;
	}
}
