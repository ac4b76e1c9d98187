/**
 * Live status record: one producer publishes, any number of readers see the latest value.
 *
 * Each publish swaps in a new frozen record, so readers never see a half-written one
 * and reads never wait on the producer. Every reader gets its own copy of the build id
 * bytes; only publish changes the stored record.
 */

import logger from "@beacon/logger";
import { assertValidStatus, freezeStatus } from "./status";
import type { StatusRecord, StatusSource } from "./types";

const log = logger.child({ module: "status-watch" });

export type StatusListener = (record: StatusRecord, version: number) => void;

export interface StatusChange {
	record: StatusRecord;
	version: number;
}

export class StatusWatch implements StatusSource {
	private record: StatusRecord;
	private currentVersion = 0;
	private readonly listeners = new Set<StatusListener>();

	constructor(initial: StatusRecord) {
		assertValidStatus(initial);
		this.record = freezeStatus(initial);
	}

	/** Number of successful publishes since construction */
	get version(): number {
		return this.currentVersion;
	}

	current(): StatusRecord {
		return freezeStatus(this.record);
	}

	/**
	 * Replace the current record. Invalid records throw InvalidStatusError and leave
	 * the current value in place.
	 */
	publish(next: StatusRecord): number {
		assertValidStatus(next);
		this.record = freezeStatus(next);
		this.currentVersion++;

		const version = this.currentVersion;
		log.debug({ version, playersCount: this.record.playersCount }, "status published");

		for (const listener of [...this.listeners]) {
			try {
				listener(this.current(), version);
			} catch (err) {
				log.error({ err, version }, "Error in status listener");
			}
		}

		return version;
	}

	subscribe(listener: StatusListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Wait for the first record newer than `sinceVersion`
	 */
	changed(sinceVersion: number, signal?: AbortSignal): Promise<StatusChange> {
		if (this.currentVersion > sinceVersion) {
			return Promise.resolve({ record: this.current(), version: this.currentVersion });
		}
		if (signal?.aborted) {
			return Promise.reject(signal.reason);
		}

		return new Promise((resolve, reject) => {
			const onAbort = () => {
				unsubscribe();
				reject(signal?.reason);
			};
			const unsubscribe = this.subscribe((record, version) => {
				if (version > sinceVersion) {
					unsubscribe();
					signal?.removeEventListener("abort", onAbort);
					resolve({ record, version });
				}
			});
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}
