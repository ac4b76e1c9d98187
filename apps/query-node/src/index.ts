/**
 * Query node - answers out-of-band status queries for a game server
 *
 * MODE=serve  runs a responder, optionally fed live status over Valkey pub/sub
 * MODE=demo   serves a record, queries it and logs what came back
 * MODE=query  asks QUERY_HOST:QUERY_PORT once and logs the answer
 */

import logger from "@beacon/logger";
import {
	QueryMetrics,
	Requester,
	Responder,
	type ResponderOptions,
	StatusWatch,
	buildIdToString,
} from "@beacon/query";
import IORedis from "ioredis";
import { initialStatus, loadConfig } from "./config";
import type { Config } from "./schemas/config";
import { runDemo } from "./demo";
import { startMetricsReporter } from "./reporter";
import { connectStatusFeed } from "./status-feed";

const log = logger.child({ service: "query-node" });

function responderOptions(config: Config): ResponderOptions {
	return {
		maxInFlight: config.QUERY_MAX_IN_FLIGHT,
		sendTimeoutMs: config.QUERY_SEND_TIMEOUT_MS,
		rateLimit:
			config.RATE_LIMIT_PER_SECOND > 0
				? { perSecond: config.RATE_LIMIT_PER_SECOND, burst: config.RATE_LIMIT_BURST }
				: undefined,
	};
}

async function serve(config: Config): Promise<void> {
	const watch = new StatusWatch(initialStatus(config));
	const metrics = new QueryMetrics();
	const responder = new Responder(
		{ address: config.QUERY_HOST, port: config.QUERY_PORT },
		watch,
		responderOptions(config)
	);
	const controller = new AbortController();

	let redis: IORedis | null = null;
	let stopFeed: (() => Promise<void>) | null = null;
	if (config.VALKEY_URL) {
		redis = new IORedis(config.VALKEY_URL);
		redis.on("connect", () => {
			log.info("Connected to Valkey");
		});
		redis.on("error", (err) => {
			log.error({ err }, "Valkey connection error");
		});
		stopFeed = await connectStatusFeed(redis, config.STATUS_CHANNEL, watch);
	}

	const stopReporter =
		config.METRICS_INTERVAL_MS > 0
			? startMetricsReporter(metrics, { intervalMs: config.METRICS_INTERVAL_MS })
			: null;

	const shutdown = (signal: string) => {
		log.info(`Received ${signal}, shutting down...`);
		controller.abort();
	};
	process.on("SIGTERM", () => shutdown("SIGTERM"));
	process.on("SIGINT", () => shutdown("SIGINT"));

	try {
		await responder.listen();
		await responder.run(metrics, controller.signal);
	} finally {
		stopReporter?.();
		if (stopFeed) {
			await stopFeed();
		}
		if (redis) {
			await redis.quit();
		}
		log.info({ metrics: metrics.snapshot() }, "Query node stopped");
	}
}

async function query(config: Config): Promise<void> {
	const requester = new Requester({ address: config.QUERY_HOST, port: config.QUERY_PORT });
	const { status, roundTripMs } = await requester.status(config.QUERY_TIMEOUT_MS);
	log.info(
		{
			server: `${config.QUERY_HOST}:${config.QUERY_PORT}`,
			roundTripMs: Number(roundTripMs.toFixed(3)),
			buildId: buildIdToString(status.buildId),
			playersCount: status.playersCount,
			playerCap: status.playerCap,
			battleMode: status.battleMode,
		},
		"Server status"
	);
}

async function main(): Promise<void> {
	const config = loadConfig(process.env);

	switch (config.MODE) {
		case "serve":
			await serve(config);
			return;
		case "query":
			await query(config);
			return;
		case "demo": {
			const result = await runDemo({
				address: { address: config.QUERY_HOST, port: config.QUERY_PORT },
				status: initialStatus(config),
				timeoutMs: config.QUERY_TIMEOUT_MS,
				responder: responderOptions(config),
			});
			if (!result.matched) {
				throw new Error("Demo response did not match the served status");
			}
			return;
		}
	}
}

main().catch((err: unknown) => {
	log.error({ err }, "Query node failed");
	process.exitCode = 1;
});
