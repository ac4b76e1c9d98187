/**
 * Server side of the status query protocol.
 *
 * One receive loop hands every datagram to an independent handler. Handlers
 * share nothing but the status source and the metrics; the responder keeps no
 * per-client state and never answers malformed input.
 */

import logger from "@beacon/logger";
import { decodeRequest, encodeResponse } from "./codec";
import {
	InvalidStatusError,
	MalformedMessageError,
	QueryTimeoutError,
	TransportFatalError,
} from "./errors";
import type { QueryMetrics } from "./metrics";
import { PeerRateLimiter, type RateLimitOptions } from "./rate-limiter";
import { type DatagramTransport, type TransportFactory, formatPeer } from "./transport";
import type { Datagram, PeerAddress, StatusSource } from "./types";
import { udpTransports } from "./udp-transport";

const log = logger.child({ module: "responder" });

const DEFAULT_MAX_IN_FLIGHT = 256;
const DEFAULT_SEND_TIMEOUT = 1000;

export interface ResponderOptions {
	/** Handlers allowed to run at once; datagrams beyond this are dropped */
	maxInFlight?: number;
	sendTimeoutMs?: number;
	/** Reject requests shorter than this, e.g. to insist on padded requests */
	minRequestLength?: number;
	rateLimit?: RateLimitOptions | null;
	transports?: TransportFactory;
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
	return new Promise((resolve, reject) => {
		const timer = setTimeout(() => reject(new QueryTimeoutError(ms)), ms);
		promise.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(err: unknown) => {
				clearTimeout(timer);
				reject(err);
			}
		);
	});
}

export class Responder {
	private readonly maxInFlight: number;
	private readonly sendTimeoutMs: number;
	private readonly minRequestLength: number;
	private readonly rateLimiter: PeerRateLimiter | null;
	private readonly transports: TransportFactory;
	private transport: DatagramTransport | null = null;
	private binding: Promise<DatagramTransport> | null = null;
	private inFlight = 0;
	private running = false;
	private stopped = false;

	constructor(
		private readonly bindAddress: PeerAddress,
		private readonly statusSource: StatusSource,
		options: ResponderOptions = {}
	) {
		this.maxInFlight = Math.max(1, options.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT);
		this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT;
		this.minRequestLength = options.minRequestLength ?? 1;
		this.rateLimiter = options.rateLimit ? new PeerRateLimiter(options.rateLimit) : null;
		this.transports = options.transports ?? udpTransports();
	}

	/** Bound address, or null before listen() */
	get localAddress(): PeerAddress | null {
		return this.transport?.localAddress ?? null;
	}

	/** Handlers currently running */
	get pending(): number {
		return this.inFlight;
	}

	/**
	 * Bind the transport. Safe to call more than once.
	 */
	async listen(): Promise<PeerAddress> {
		const transport = await this.bind();
		return transport.localAddress;
	}

	private async bind(): Promise<DatagramTransport> {
		if (!this.binding) {
			this.binding = this.transports.bind(this.bindAddress);
		}
		this.transport = await this.binding;
		return this.transport;
	}

	/**
	 * Answer queries until the signal aborts (resolves) or the transport fails (rejects with
	 * TransportFatalError). Binds first if listen() has not been called.
	 */
	async run(metrics: QueryMetrics, signal?: AbortSignal): Promise<void> {
		if (this.running) {
			throw new Error("Responder is already running");
		}
		this.running = true;

		const onAbort = () => {
			this.close().catch((err: unknown) => {
				log.warn({ err }, "Failed to close query transport");
			});
		};

		try {
			const transport = await this.bind();
			if (signal?.aborted || this.stopped) {
				await this.close();
				return;
			}
			signal?.addEventListener("abort", onAbort, { once: true });

			log.info(
				{
					address: formatPeer(transport.localAddress),
					maxInFlight: this.maxInFlight,
					rateLimited: this.rateLimiter !== null,
				},
				"Query responder listening"
			);

			while (true) {
				let datagram: Datagram;
				try {
					datagram = await transport.receive();
				} catch (err) {
					if (signal?.aborted || this.stopped) {
						log.info("Query responder stopped");
						return;
					}
					if (err instanceof TransportFatalError) {
						log.error({ err }, "Query transport failed");
						await this.close();
						throw err;
					}
					log.warn({ err }, "Receive error, continuing");
					continue;
				}

				this.dispatch(datagram, metrics);
			}
		} finally {
			signal?.removeEventListener("abort", onAbort);
			this.running = false;
		}
	}

	/**
	 * Release the transport. A running loop resolves; the responder cannot be reused.
	 */
	async close(): Promise<void> {
		this.stopped = true;
		const transport = this.transport;
		if (transport) {
			await transport.close();
		}
	}

	private dispatch(datagram: Datagram, metrics: QueryMetrics): void {
		metrics.increment("requestsReceived");

		if (this.rateLimiter && !this.rateLimiter.take(datagram.peer.address)) {
			metrics.increment("rateLimited");
			return;
		}

		if (this.inFlight >= this.maxInFlight) {
			metrics.increment("dropped");
			log.debug(
				{ peer: formatPeer(datagram.peer), inFlight: this.inFlight },
				"Too many requests in flight, dropping"
			);
			return;
		}

		this.inFlight++;
		void this.handle(datagram, metrics)
			.catch((err: unknown) => {
				log.error({ err, peer: formatPeer(datagram.peer) }, "Unexpected error handling query");
			})
			.finally(() => {
				this.inFlight--;
			});
	}

	private async handle(datagram: Datagram, metrics: QueryMetrics): Promise<void> {
		const startedAt = performance.now();
		const peer = formatPeer(datagram.peer);

		try {
			decodeRequest(datagram.data, this.minRequestLength);
		} catch (err) {
			if (err instanceof MalformedMessageError) {
				metrics.increment("decodeErrors");
				log.debug({ peer, reason: err.message }, "Ignoring malformed request");
				return;
			}
			throw err;
		}

		let response: Uint8Array;
		try {
			response = encodeResponse(this.statusSource.current());
		} catch (err) {
			if (err instanceof InvalidStatusError) {
				metrics.increment("encodeErrors");
				log.error({ err }, "Current status cannot be encoded");
				return;
			}
			throw err;
		}

		const transport = this.transport;
		if (!transport) {
			return;
		}

		try {
			await withTimeout(transport.send(datagram.peer, response), this.sendTimeoutMs);
			metrics.increment("responsesSent");
			metrics.recordHandlingTime(performance.now() - startedAt);
		} catch (err) {
			if (err instanceof QueryTimeoutError) {
				metrics.increment("sendTimeouts");
				log.warn({ peer, timeoutMs: this.sendTimeoutMs }, "Response send timed out");
			} else {
				metrics.increment("sendErrors");
				log.warn({ err, peer }, "Failed to send response");
			}
		}
	}
}
