/**
 * StatusRecord helpers and validation
 */

import { z } from "zod";
import { InvalidStatusError } from "./errors";
import type { BattleMode, StatusRecord } from "./types";

export const BUILD_ID_LENGTH = 8;
export const U16_MAX = 0xffff;

const countSchema = z.number().int().min(0).max(U16_MAX);

export const battleModeSchema = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("global-pvp") }),
	z.object({ kind: z.literal("global-pve") }),
	z.object({ kind: z.literal("per-player"), defaultPvp: z.boolean() }),
]);

export const statusRecordSchema = z.object({
	buildId: z
		.instanceof(Uint8Array)
		.refine((bytes) => bytes.length === BUILD_ID_LENGTH, {
			message: `buildId must be exactly ${BUILD_ID_LENGTH} bytes`,
		}),
	playersCount: countSchema,
	playerCap: countSchema,
	battleMode: battleModeSchema,
});

/**
 * Check that a record fits the wire format, throwing InvalidStatusError otherwise
 */
export function assertValidStatus(record: StatusRecord): void {
	const result = statusRecordSchema.safeParse(record);
	if (!result.success) {
		const issue = result.error.issues[0];
		const path = issue?.path.join(".") || "record";
		throw new InvalidStatusError(`Invalid status ${path}: ${issue?.message ?? "unknown issue"}`);
	}
}

/**
 * Whether `id` fits in a build id without truncation
 */
export function buildIdFits(id: string): boolean {
	return new TextEncoder().encode(id).length <= BUILD_ID_LENGTH;
}

/**
 * Encode a short build identifier (e.g. a git hash prefix) as ASCII,
 * truncated or zero-padded to 8 bytes.
 */
export function buildIdFromString(id: string): Uint8Array {
	const bytes = new Uint8Array(BUILD_ID_LENGTH);
	const encoded = new TextEncoder().encode(id);
	bytes.set(encoded.subarray(0, BUILD_ID_LENGTH));
	return bytes;
}

/**
 * Read a build id as text, stopping at the first zero byte
 */
export function buildIdToString(buildId: Uint8Array): string {
	const end = buildId.indexOf(0);
	return new TextDecoder().decode(end === -1 ? buildId : buildId.subarray(0, end));
}

export function createStatusRecord(fields: Partial<StatusRecord> = {}): StatusRecord {
	return {
		buildId: fields.buildId ?? new Uint8Array(BUILD_ID_LENGTH),
		playersCount: fields.playersCount ?? 0,
		playerCap: fields.playerCap ?? 0,
		battleMode: fields.battleMode ?? { kind: "global-pve" },
	};
}

function battleModesEqual(a: BattleMode, b: BattleMode): boolean {
	if (a.kind === "per-player" && b.kind === "per-player") {
		return a.defaultPvp === b.defaultPvp;
	}
	return a.kind === b.kind;
}

export function statusRecordsEqual(a: StatusRecord, b: StatusRecord): boolean {
	if (a.buildId.length !== b.buildId.length) {
		return false;
	}
	for (let i = 0; i < a.buildId.length; i++) {
		if (a.buildId[i] !== b.buildId[i]) {
			return false;
		}
	}
	return (
		a.playersCount === b.playersCount &&
		a.playerCap === b.playerCap &&
		battleModesEqual(a.battleMode, b.battleMode)
	);
}

/**
 * Copy a record into a frozen value that shares nothing with the caller.
 * The build id bytes are copied since typed arrays cannot be frozen.
 */
export function freezeStatus(record: StatusRecord): StatusRecord {
	const battleMode: BattleMode =
		record.battleMode.kind === "per-player"
			? { kind: "per-player", defaultPvp: record.battleMode.defaultPvp }
			: { kind: record.battleMode.kind };
	return Object.freeze({
		buildId: new Uint8Array(record.buildId),
		playersCount: record.playersCount,
		playerCap: record.playerCap,
		battleMode: Object.freeze(battleMode),
	});
}
