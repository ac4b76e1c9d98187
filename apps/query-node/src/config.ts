import { type BattleMode, type StatusRecord, buildIdFromString } from "@beacon/query";
import { type Config, configSchema } from "./schemas/config";

export function loadConfig(env: NodeJS.ProcessEnv): Config {
	return configSchema.parse({
		MODE: env.MODE,
		QUERY_HOST: env.QUERY_HOST,
		QUERY_PORT: env.QUERY_PORT,
		QUERY_TIMEOUT_MS: env.QUERY_TIMEOUT_MS,
		QUERY_MAX_IN_FLIGHT: env.QUERY_MAX_IN_FLIGHT,
		QUERY_SEND_TIMEOUT_MS: env.QUERY_SEND_TIMEOUT_MS,
		RATE_LIMIT_PER_SECOND: env.RATE_LIMIT_PER_SECOND,
		RATE_LIMIT_BURST: env.RATE_LIMIT_BURST,
		METRICS_INTERVAL_MS: env.METRICS_INTERVAL_MS,
		BUILD_ID: env.BUILD_ID,
		PLAYERS_COUNT: env.PLAYERS_COUNT,
		PLAYER_CAP: env.PLAYER_CAP,
		BATTLE_MODE: env.BATTLE_MODE,
		VALKEY_URL: env.VALKEY_URL,
		STATUS_CHANNEL: env.STATUS_CHANNEL,
	});
}

function battleModeFrom(mode: Config["BATTLE_MODE"]): BattleMode {
	switch (mode) {
		case "global-pvp":
			return { kind: "global-pvp" };
		case "global-pve":
			return { kind: "global-pve" };
		case "per-player-pvp":
			return { kind: "per-player", defaultPvp: true };
		case "per-player-pve":
			return { kind: "per-player", defaultPvp: false };
	}
}

export function initialStatus(config: Config): StatusRecord {
	return {
		buildId: buildIdFromString(config.BUILD_ID),
		playersCount: config.PLAYERS_COUNT,
		playerCap: config.PLAYER_CAP,
		battleMode: battleModeFrom(config.BATTLE_MODE),
	};
}
