/**
 * Datagram transport seam shared by the responder and requester.
 */

import { TransportFatalError } from "./errors";
import type { Datagram, PeerAddress } from "./types";

export interface DatagramTransport {
	readonly localAddress: PeerAddress;
	/** Next datagram. Rejects with TransportFatalError once the transport is closed or broken. */
	receive(signal?: AbortSignal): Promise<Datagram>;
	send(peer: PeerAddress, data: Uint8Array): Promise<void>;
	/** Idempotent */
	close(): Promise<void>;
}

export interface TransportFactory {
	bind(address: PeerAddress): Promise<DatagramTransport>;
	/** Turn a host name into the address datagrams will arrive from */
	resolve(host: string): Promise<string>;
}

export const DEFAULT_QUEUE_LIMIT = 1024;

interface Waiter {
	resolve: (datagram: Datagram) => void;
	reject: (error: unknown) => void;
}

/**
 * Bounded inbox between a socket's event callbacks and `receive()` callers.
 * When full, the oldest datagram is dropped.
 */
export class DatagramQueue {
	private readonly items: Datagram[] = [];
	private readonly waiters: Waiter[] = [];
	private failure: TransportFatalError | null = null;
	private droppedCount = 0;

	constructor(private readonly limit: number = DEFAULT_QUEUE_LIMIT) {}

	get dropped(): number {
		return this.droppedCount;
	}

	get closed(): boolean {
		return this.failure !== null;
	}

	/**
	 * Returns false when an older datagram had to be dropped to make room
	 */
	push(datagram: Datagram): boolean {
		if (this.failure) {
			return true;
		}

		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve(datagram);
			return true;
		}

		this.items.push(datagram);
		if (this.items.length > this.limit) {
			this.items.shift();
			this.droppedCount++;
			return false;
		}
		return true;
	}

	next(signal?: AbortSignal): Promise<Datagram> {
		const queued = this.items.shift();
		if (queued) {
			return Promise.resolve(queued);
		}
		if (this.failure) {
			return Promise.reject(this.failure);
		}
		if (signal?.aborted) {
			return Promise.reject(signal.reason);
		}

		return new Promise((resolve, reject) => {
			const onAbort = () => {
				const index = this.waiters.indexOf(waiter);
				if (index !== -1) {
					this.waiters.splice(index, 1);
				}
				reject(signal?.reason);
			};
			const waiter: Waiter = {
				resolve: (datagram) => {
					signal?.removeEventListener("abort", onAbort);
					resolve(datagram);
				},
				reject: (error) => {
					signal?.removeEventListener("abort", onAbort);
					reject(error);
				},
			};
			this.waiters.push(waiter);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	/**
	 * Fail every pending and future receive. Queued datagrams are discarded.
	 */
	fail(error: TransportFatalError): void {
		if (this.failure) {
			return;
		}
		this.failure = error;
		this.items.length = 0;
		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(error);
		}
	}
}

export function sameAddress(a: PeerAddress, b: PeerAddress): boolean {
	return normalizeHost(a.address) === normalizeHost(b.address) && a.port === b.port;
}

// IPv4 peers on a dual-stack socket show up as ::ffff:a.b.c.d
function normalizeHost(address: string): string {
	return address.startsWith("::ffff:") ? address.slice(7) : address.toLowerCase();
}

export function formatPeer(peer: PeerAddress): string {
	return peer.address.includes(":") ? `[${peer.address}]:${peer.port}` : `${peer.address}:${peer.port}`;
}
