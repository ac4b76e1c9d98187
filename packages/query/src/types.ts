/**
 * Types for the status query protocol
 */

export type BattleMode =
	| { kind: "global-pvp" }
	| { kind: "global-pve" }
	// Players choose for themselves; defaultPvp applies until they do
	| { kind: "per-player"; defaultPvp: boolean };

export type BattleModeKind = BattleMode["kind"];

/**
 * Snapshot of what a server is and how busy it is.
 * Pure value: two records with equal fields are interchangeable.
 */
export interface StatusRecord {
	/** 8 opaque bytes identifying the running build, all zero when unknown */
	readonly buildId: Uint8Array;
	readonly playersCount: number;
	/** Not checked against playersCount, servers may report over-cap states */
	readonly playerCap: number;
	readonly battleMode: BattleMode;
}

export interface PeerAddress {
	address: string;
	port: number;
}

export interface Datagram {
	data: Uint8Array;
	peer: PeerAddress;
}

/**
 * Decoded query request. Extension bytes are reserved and passed through uninterpreted.
 */
export interface QueryRequest {
	version: number;
	extension: Uint8Array;
}

export interface StatusResult {
	status: StatusRecord;
	roundTripMs: number;
}

/**
 * Read side of a live status record
 */
export interface StatusSource {
	current(): StatusRecord;
}
