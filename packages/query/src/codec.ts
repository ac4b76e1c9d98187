/**
 * Wire codec for the status query protocol.
 *
 * Every frame is a single datagram with no length prefix. All multi-byte
 * integers are unsigned 16-bit, big-endian.
 *
 *   request:  [version:1][reserved:0..63]
 *   response: [version:1][build_id:8][players_count:2][player_cap:2][mode_tag:1][mode_payload:0..1]
 */

import { MalformedMessageError } from "./errors";
import { BUILD_ID_LENGTH, assertValidStatus } from "./status";
import type { BattleMode, QueryRequest, StatusRecord } from "./types";

export const PROTOCOL_VERSION = 0x01;

export const REQUEST_MIN_LENGTH = 1;
export const REQUEST_MAX_LENGTH = 64;

// version + build id + two counts + mode tag
export const RESPONSE_MIN_LENGTH = 1 + BUILD_ID_LENGTH + 2 + 2 + 1;
export const RESPONSE_MAX_LENGTH = RESPONSE_MIN_LENGTH + 1;

export const BattleModeTag = {
	GlobalPvP: 0x00,
	GlobalPvE: 0x01,
	PerPlayer: 0x02,
} as const;

const PLAYERS_OFFSET = 1 + BUILD_ID_LENGTH;
const CAP_OFFSET = PLAYERS_OFFSET + 2;
const TAG_OFFSET = CAP_OFFSET + 2;

function hex(byte: number): string {
	return `0x${byte.toString(16).padStart(2, "0")}`;
}

function view(bytes: Uint8Array): DataView {
	// Node hands out views into pooled buffers, so the offset matters
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Build a request frame. Requests are zero-padded to the largest response size
 * by default so that answering one never sends more bytes than were received.
 */
export function encodeRequest(paddedLength: number = RESPONSE_MAX_LENGTH): Uint8Array {
	const length = Math.min(Math.max(Math.trunc(paddedLength), REQUEST_MIN_LENGTH), REQUEST_MAX_LENGTH);
	const frame = new Uint8Array(length);
	frame[0] = PROTOCOL_VERSION;
	return frame;
}

/**
 * Parse a request frame. `minLength` lets a responder insist on padded requests.
 */
export function decodeRequest(bytes: Uint8Array, minLength: number = REQUEST_MIN_LENGTH): QueryRequest {
	const required = Math.max(minLength, REQUEST_MIN_LENGTH);
	if (bytes.length < required) {
		throw new MalformedMessageError(`Request too short: ${bytes.length} bytes (minimum ${required})`);
	}
	if (bytes.length > REQUEST_MAX_LENGTH) {
		throw new MalformedMessageError(
			`Request too long: ${bytes.length} bytes (maximum ${REQUEST_MAX_LENGTH})`
		);
	}

	const version = bytes[0];
	if (version !== PROTOCOL_VERSION) {
		throw new MalformedMessageError(`Unsupported protocol version ${hex(version ?? 0)}`);
	}

	return { version, extension: new Uint8Array(bytes.subarray(1)) };
}

function battleModeTag(mode: BattleMode): number {
	switch (mode.kind) {
		case "global-pvp":
			return BattleModeTag.GlobalPvP;
		case "global-pve":
			return BattleModeTag.GlobalPvE;
		case "per-player":
			return BattleModeTag.PerPlayer;
	}
}

/**
 * Build a response frame for a status record.
 * Throws InvalidStatusError when a field does not fit its wire width.
 */
export function encodeResponse(record: StatusRecord): Uint8Array {
	assertValidStatus(record);

	const payloadLength = record.battleMode.kind === "per-player" ? 1 : 0;
	const frame = new Uint8Array(RESPONSE_MIN_LENGTH + payloadLength);
	const dv = view(frame);

	frame[0] = PROTOCOL_VERSION;
	frame.set(record.buildId, 1);
	dv.setUint16(PLAYERS_OFFSET, record.playersCount, false);
	dv.setUint16(CAP_OFFSET, record.playerCap, false);
	frame[TAG_OFFSET] = battleModeTag(record.battleMode);

	if (record.battleMode.kind === "per-player") {
		frame[TAG_OFFSET + 1] = record.battleMode.defaultPvp ? 1 : 0;
	}

	return frame;
}

/**
 * Decode the mode tag and its payload, returning the mode and the total frame length it implies
 */
function decodeBattleMode(bytes: Uint8Array): { mode: BattleMode; frameLength: number } {
	const tag = bytes[TAG_OFFSET] ?? 0;

	switch (tag) {
		case BattleModeTag.GlobalPvP:
			return { mode: { kind: "global-pvp" }, frameLength: RESPONSE_MIN_LENGTH };
		case BattleModeTag.GlobalPvE:
			return { mode: { kind: "global-pve" }, frameLength: RESPONSE_MIN_LENGTH };
		case BattleModeTag.PerPlayer: {
			const flag = bytes[TAG_OFFSET + 1];
			if (flag === undefined) {
				throw new MalformedMessageError("Response truncated: per-player mode is missing its payload");
			}
			if (flag > 1) {
				throw new MalformedMessageError(`Invalid per-player default ${hex(flag)}`);
			}
			return {
				mode: { kind: "per-player", defaultPvp: flag === 1 },
				frameLength: RESPONSE_MIN_LENGTH + 1,
			};
		}
		default:
			throw new MalformedMessageError(`Unknown battle mode tag ${hex(tag)}`);
	}
}

/**
 * Parse a response frame. Never returns a partial record: any defect throws
 * MalformedMessageError.
 */
export function decodeResponse(bytes: Uint8Array): StatusRecord {
	if (bytes.length < RESPONSE_MIN_LENGTH) {
		throw new MalformedMessageError(
			`Response too short: ${bytes.length} bytes (minimum ${RESPONSE_MIN_LENGTH})`
		);
	}

	const version = bytes[0] ?? 0;
	if (version !== PROTOCOL_VERSION) {
		throw new MalformedMessageError(`Unsupported protocol version ${hex(version)}`);
	}

	const { mode, frameLength } = decodeBattleMode(bytes);
	if (bytes.length !== frameLength) {
		throw new MalformedMessageError(
			`Response length ${bytes.length} does not match ${mode.kind} frame (${frameLength} bytes)`
		);
	}

	const dv = view(bytes);
	return {
		// Copy into a plain Uint8Array, Buffer#slice would alias the datagram
		buildId: new Uint8Array(bytes.subarray(1, 1 + BUILD_ID_LENGTH)),
		playersCount: dv.getUint16(PLAYERS_OFFSET, false),
		playerCap: dv.getUint16(CAP_OFFSET, false),
		battleMode: mode,
	};
}
