/**
 * In-process datagram network.
 *
 * Behaves like loopback UDP without touching the OS: delivery is asynchronous,
 * datagrams to an address nobody is bound to vanish, and port 0 picks an
 * ephemeral port. Endpoints bound to a wildcard address receive traffic for
 * any address on their port and send from loopback.
 */

import { isIP } from "node:net";
import { TransportFatalError } from "./errors";
import { DatagramQueue, type DatagramTransport, type TransportFactory, formatPeer } from "./transport";
import type { Datagram, PeerAddress } from "./types";

const EPHEMERAL_PORT_START = 49152;
const PORT_MAX = 65535;

function wildcardFor(address: string): string {
	return isIP(address) === 6 ? "::" : "0.0.0.0";
}

function isWildcard(address: string): boolean {
	return address === "0.0.0.0" || address === "::";
}

function loopbackFor(address: string): string {
	return address === "::" ? "::1" : "127.0.0.1";
}

class MemoryTransport implements DatagramTransport {
	readonly queue = new DatagramQueue();

	constructor(
		private readonly network: MemoryNetwork,
		readonly localAddress: PeerAddress
	) {}

	receive(signal?: AbortSignal): Promise<Datagram> {
		return this.queue.next(signal);
	}

	async send(peer: PeerAddress, data: Uint8Array): Promise<void> {
		if (this.queue.closed) {
			throw new TransportFatalError("Endpoint closed");
		}
		this.network.deliver(this.localAddress, peer, data);
	}

	async close(): Promise<void> {
		this.queue.fail(new TransportFatalError("Endpoint closed"));
		this.network.release(this);
	}
}

export class MemoryNetwork implements TransportFactory {
	private readonly endpoints = new Map<string, MemoryTransport>();
	private nextPort = EPHEMERAL_PORT_START;
	private sentCount = 0;

	/** Datagrams handed to the network, delivered or not */
	get sent(): number {
		return this.sentCount;
	}

	async bind(address: PeerAddress): Promise<DatagramTransport> {
		const port = address.port === 0 ? this.allocatePort(address.address) : address.port;
		const local = { address: address.address, port };
		const key = formatPeer(local);
		if (this.endpoints.has(key)) {
			throw new TransportFatalError(`Address already in use: ${key}`);
		}

		const transport = new MemoryTransport(this, local);
		this.endpoints.set(key, transport);
		return transport;
	}

	async resolve(host: string): Promise<string> {
		return host;
	}

	deliver(from: PeerAddress, to: PeerAddress, data: Uint8Array): void {
		this.sentCount++;
		// Copy so the sender can reuse its buffer, like a real socket
		const copy = new Uint8Array(data);
		const source = isWildcard(from.address)
			? { address: loopbackFor(from.address), port: from.port }
			: { ...from };
		setImmediate(() => {
			const endpoint =
				this.endpoints.get(formatPeer(to)) ??
				this.endpoints.get(formatPeer({ address: wildcardFor(to.address), port: to.port }));
			endpoint?.queue.push({ data: copy, peer: source });
		});
	}

	release(transport: MemoryTransport): void {
		const key = formatPeer(transport.localAddress);
		if (this.endpoints.get(key) === transport) {
			this.endpoints.delete(key);
		}
	}

	private allocatePort(address: string): number {
		for (let attempts = 0; attempts <= PORT_MAX - EPHEMERAL_PORT_START; attempts++) {
			const port = this.nextPort;
			this.nextPort = port >= PORT_MAX ? EPHEMERAL_PORT_START : port + 1;
			if (!this.endpoints.has(formatPeer({ address, port }))) {
				return port;
			}
		}
		throw new TransportFatalError(`No free ports on ${address}`);
	}
}
