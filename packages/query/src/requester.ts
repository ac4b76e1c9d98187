/**
 * Client side of the status query protocol
 */

import { isIP } from "node:net";
import logger from "@beacon/logger";
import { decodeResponse, encodeRequest } from "./codec";
import { QueryError, QueryTimeoutError, TransportFatalError, isAbortError } from "./errors";
import { type DatagramTransport, type TransportFactory, sameAddress } from "./transport";
import type { PeerAddress, StatusResult } from "./types";
import { udpTransports } from "./udp-transport";

const log = logger.child({ module: "requester" });

const DEFAULT_TIMEOUT = 5000;

export interface RequesterOptions {
	transports?: TransportFactory;
}

function toTransportError(err: unknown): QueryError {
	if (err instanceof QueryError) {
		return err;
	}
	const message = err instanceof Error ? err.message : String(err);
	return new TransportFatalError(`Query transport failed: ${message}`, { cause: err });
}

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
	if (signal.aborted) {
		return Promise.reject(signal.reason);
	}
	return new Promise((resolve, reject) => {
		const onAbort = () => reject(signal.reason);
		signal.addEventListener("abort", onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(err: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(err);
			}
		);
	});
}

// A bind that finishes after the caller gave up still holds a socket
function closeWhenBound(binding: Promise<DatagramTransport>): void {
	binding
		.then((transport) => transport.close())
		.catch((err: unknown) => {
			log.debug({ err }, "Late bind did not complete");
		});
}

export class Requester {
	private readonly transports: TransportFactory;

	constructor(
		readonly server: PeerAddress,
		options: RequesterOptions = {}
	) {
		this.transports = options.transports ?? udpTransports();
	}

	/**
	 * Send one status request and wait for the answer.
	 *
	 * Each call binds its own ephemeral endpoint, so calls may overlap freely.
	 * Nothing is retried: a lost datagram surfaces as QueryTimeoutError.
	 */
	async status(timeoutMs: number = DEFAULT_TIMEOUT): Promise<StatusResult> {
		const controller = new AbortController();
		const timer = setTimeout(() => controller.abort(), timeoutMs);

		try {
			const address = await untilAborted(
				this.transports.resolve(this.server.address),
				controller.signal
			);
			const server = { address, port: this.server.port };
			const binding = this.transports.bind({
				address: isIP(address) === 6 ? "::" : "0.0.0.0",
				port: 0,
			});
			let transport: DatagramTransport;
			try {
				transport = await untilAborted(binding, controller.signal);
			} catch (err) {
				if (controller.signal.aborted) {
					closeWhenBound(binding);
				}
				throw err;
			}

			try {
				const startedAt = performance.now();
				await transport.send(server, encodeRequest());

				while (true) {
					const datagram = await transport.receive(controller.signal);
					// Anyone can send to an open port, only trust the server's address
					if (!sameAddress(datagram.peer, server)) {
						continue;
					}
					const status = decodeResponse(datagram.data);
					return { status, roundTripMs: performance.now() - startedAt };
				}
			} finally {
				await transport.close();
			}
		} catch (err) {
			if (controller.signal.aborted && isAbortError(err)) {
				throw new QueryTimeoutError(timeoutMs);
			}
			throw toTransportError(err);
		} finally {
			clearTimeout(timer);
		}
	}
}

/**
 * Check if a server answers status queries
 */
export async function isOnline(
	server: PeerAddress,
	timeoutMs = DEFAULT_TIMEOUT,
	options: RequesterOptions = {}
): Promise<boolean> {
	try {
		await new Requester(server, options).status(timeoutMs);
		return true;
	} catch (err) {
		if (err instanceof QueryError) {
			return false;
		}
		throw err;
	}
}

/**
 * Get player count from a server
 */
export async function getPlayerCount(
	server: PeerAddress,
	timeoutMs = DEFAULT_TIMEOUT,
	options: RequesterOptions = {}
): Promise<{ online: number; max: number }> {
	const { status } = await new Requester(server, options).status(timeoutMs);
	return {
		online: status.playersCount,
		max: status.playerCap,
	};
}
