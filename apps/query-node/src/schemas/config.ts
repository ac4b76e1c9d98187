import { buildIdFits } from "@beacon/query";
import { z } from "zod";

const port = z.coerce.number().int().min(0).max(65535);
const count = z.coerce.number().int().min(0).max(65535);

export const configSchema = z.object({
	MODE: z.enum(["serve", "demo", "query"]).default("demo"),

	// Responder / target address
	QUERY_HOST: z.string().min(1).default("127.0.0.1"),
	QUERY_PORT: port.default(14006),
	QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
	QUERY_MAX_IN_FLIGHT: z.coerce.number().int().positive().default(256),
	QUERY_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),

	// Per-peer rate limit, 0 disables it
	RATE_LIMIT_PER_SECOND: z.coerce.number().min(0).default(0),
	RATE_LIMIT_BURST: z.coerce.number().int().min(1).default(10),

	// Metrics log interval, 0 disables it
	METRICS_INTERVAL_MS: z.coerce.number().int().min(0).default(30_000),

	// Initial status record
	BUILD_ID: z.string().refine(buildIdFits, "BUILD_ID is at most 8 bytes").default(""),
	PLAYERS_COUNT: count.default(0),
	PLAYER_CAP: count.default(300),
	BATTLE_MODE: z
		.enum(["global-pvp", "global-pve", "per-player-pvp", "per-player-pve"])
		.default("global-pve"),

	// Valkey (Redis-compatible) pub/sub for live status updates
	VALKEY_URL: z.string().url().optional(),
	STATUS_CHANNEL: z.string().min(1).default("beacon:status"),
});

export type Config = z.infer<typeof configSchema>;
