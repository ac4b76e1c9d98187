/**
 * UDP transport over node:dgram
 */

import dgram from "node:dgram";
import { lookup } from "node:dns/promises";
import { isIP } from "node:net";
import logger from "@beacon/logger";
import { TransportFatalError } from "./errors";
import {
	DEFAULT_QUEUE_LIMIT,
	DatagramQueue,
	type DatagramTransport,
	type TransportFactory,
	formatPeer,
} from "./transport";
import type { Datagram, PeerAddress } from "./types";

const log = logger.child({ module: "udp-transport" });

export interface UdpTransportOptions {
	queueLimit?: number;
}

class UdpTransport implements DatagramTransport {
	private readonly queue: DatagramQueue;
	private closing: Promise<void> | null = null;
	private overflowing = false;

	constructor(
		private readonly socket: dgram.Socket,
		readonly localAddress: PeerAddress,
		queueLimit: number
	) {
		this.queue = new DatagramQueue(queueLimit);

		socket.on("message", (msg, rinfo) => {
			const datagram: Datagram = { data: msg, peer: { address: rinfo.address, port: rinfo.port } };
			const kept = this.queue.push(datagram);
			if (!kept && !this.overflowing) {
				this.overflowing = true;
				log.warn(
					{ local: formatPeer(localAddress), dropped: this.queue.dropped },
					"Receive queue full, dropping oldest datagrams"
				);
			} else if (kept && this.overflowing) {
				this.overflowing = false;
			}
		});

		socket.on("error", (err) => {
			log.error({ err, local: formatPeer(localAddress) }, "UDP socket error");
			this.queue.fail(new TransportFatalError(`UDP socket error: ${err.message}`, { cause: err }));
			void this.close();
		});

		socket.on("close", () => {
			this.queue.fail(new TransportFatalError("UDP socket closed"));
		});
	}

	receive(signal?: AbortSignal): Promise<Datagram> {
		return this.queue.next(signal);
	}

	send(peer: PeerAddress, data: Uint8Array): Promise<void> {
		if (this.queue.closed) {
			return Promise.reject(new TransportFatalError("UDP socket closed"));
		}
		return new Promise((resolve, reject) => {
			this.socket.send(data, peer.port, peer.address, (err) => {
				if (err) {
					reject(err);
				} else {
					resolve();
				}
			});
		});
	}

	close(): Promise<void> {
		if (!this.closing) {
			this.closing = new Promise((resolve) => {
				this.queue.fail(new TransportFatalError("UDP socket closed"));
				try {
					this.socket.close(() => resolve());
				} catch {
					// Already closed by the runtime after an error
					resolve();
				}
			});
		}
		return this.closing;
	}
}

/**
 * Bind a UDP socket. The socket family follows the bind address.
 */
export function bindUdp(address: PeerAddress, options: UdpTransportOptions = {}): Promise<DatagramTransport> {
	const type = isIP(address.address) === 6 ? "udp6" : "udp4";
	const socket = dgram.createSocket({ type });

	return new Promise((resolve, reject) => {
		const onError = (err: Error) => {
			socket.close();
			reject(new TransportFatalError(`Failed to bind ${formatPeer(address)}: ${err.message}`, { cause: err }));
		};

		socket.once("error", onError);
		socket.bind(address.port, address.address, () => {
			socket.off("error", onError);
			const bound = socket.address();
			resolve(
				new UdpTransport(
					socket,
					{ address: bound.address, port: bound.port },
					options.queueLimit ?? DEFAULT_QUEUE_LIMIT
				)
			);
		});
	});
}

export function udpTransports(options: UdpTransportOptions = {}): TransportFactory {
	return {
		bind: (address) => bindUdp(address, options),
		async resolve(host) {
			if (isIP(host) !== 0) {
				return host;
			}
			const { address } = await lookup(host);
			return address;
		},
	};
}
