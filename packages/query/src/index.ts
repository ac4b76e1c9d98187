/**
 * @beacon/query - out-of-band server status queries
 *
 * One datagram in, one datagram out: a client asks a running server what it is
 * and how busy it is, without opening a session.
 *
 * @example
 * ```ts
 * import { QueryMetrics, Requester, Responder, StatusWatch, buildIdFromString } from "@beacon/query";
 *
 * const watch = new StatusWatch({
 * 	buildId: buildIdFromString("4f2a9c1e"),
 * 	playersCount: 5,
 * 	playerCap: 100,
 * 	battleMode: { kind: "global-pve" },
 * });
 * const responder = new Responder({ address: "0.0.0.0", port: 14006 }, watch);
 * const controller = new AbortController();
 * const running = responder.run(new QueryMetrics(), controller.signal);
 *
 * const { status, roundTripMs } = await new Requester({ address: "127.0.0.1", port: 14006 }).status(1000);
 * console.log(`${status.playersCount}/${status.playerCap} players, ${roundTripMs.toFixed(1)}ms`);
 *
 * controller.abort();
 * await running;
 * ```
 */

export {
	BattleModeTag,
	PROTOCOL_VERSION,
	REQUEST_MAX_LENGTH,
	REQUEST_MIN_LENGTH,
	RESPONSE_MAX_LENGTH,
	RESPONSE_MIN_LENGTH,
	decodeRequest,
	decodeResponse,
	encodeRequest,
	encodeResponse,
} from "./codec";
export {
	InvalidStatusError,
	MalformedMessageError,
	QueryError,
	QueryTimeoutError,
	TransportFatalError,
	isAbortError,
} from "./errors";
export type { QueryErrorCode } from "./errors";
export { MemoryNetwork } from "./memory-transport";
export { COUNTERS, QueryMetrics } from "./metrics";
export type { CounterName, MetricsReader, MetricsSnapshot } from "./metrics";
export { PeerRateLimiter } from "./rate-limiter";
export type { RateLimitOptions } from "./rate-limiter";
export { Requester, getPlayerCount, isOnline } from "./requester";
export type { RequesterOptions } from "./requester";
export { Responder } from "./responder";
export type { ResponderOptions } from "./responder";
export {
	BUILD_ID_LENGTH,
	battleModeSchema,
	buildIdFits,
	buildIdFromString,
	buildIdToString,
	createStatusRecord,
	statusRecordSchema,
	statusRecordsEqual,
} from "./status";
export { StatusWatch } from "./status-watch";
export type { StatusChange, StatusListener } from "./status-watch";
export { formatPeer, sameAddress } from "./transport";
export type { DatagramTransport, TransportFactory } from "./transport";
export type {
	BattleMode,
	BattleModeKind,
	Datagram,
	PeerAddress,
	QueryRequest,
	StatusRecord,
	StatusResult,
	StatusSource,
} from "./types";
export { bindUdp, udpTransports } from "./udp-transport";
export type { UdpTransportOptions } from "./udp-transport";
