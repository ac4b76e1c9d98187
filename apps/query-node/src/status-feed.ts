/**
 * Live status feed over Valkey pub/sub.
 *
 * The game server owns the status record and publishes it as JSON on a channel;
 * this keeps the responder's StatusWatch in step. Bad messages are logged and
 * skipped, the last good record stays in place.
 */

import logger from "@beacon/logger";
import {
	type StatusRecord,
	type StatusWatch,
	battleModeSchema,
	buildIdFits,
	buildIdFromString,
} from "@beacon/query";
import { z } from "zod";

const log = logger.child({ module: "status-feed" });

export const StatusMessage = z.object({
	buildId: z.string().refine(buildIdFits, "buildId is at most 8 bytes").default(""),
	playersCount: z.number().int().min(0).max(65535),
	playerCap: z.number().int().min(0).max(65535),
	battleMode: battleModeSchema,
});

export type StatusMessageType = z.infer<typeof StatusMessage>;

/**
 * The slice of an ioredis subscriber connection the feed needs
 */
export interface StatusSubscriber {
	subscribe(channel: string): Promise<unknown>;
	unsubscribe(channel: string): Promise<unknown>;
	on(event: "message", listener: (channel: string, message: string) => void): unknown;
	off(event: "message", listener: (channel: string, message: string) => void): unknown;
}

export function parseStatusMessage(message: string): StatusRecord | null {
	let raw: unknown;
	try {
		raw = JSON.parse(message);
	} catch (err) {
		log.warn({ err }, "Status message is not JSON");
		return null;
	}

	const result = StatusMessage.safeParse(raw);
	if (!result.success) {
		log.warn({ issues: result.error.issues }, "Status message failed validation");
		return null;
	}

	return {
		buildId: buildIdFromString(result.data.buildId),
		playersCount: result.data.playersCount,
		playerCap: result.data.playerCap,
		battleMode: result.data.battleMode,
	};
}

/**
 * Subscribe to `channel` and publish every valid message into `watch`.
 * Returns a function that unsubscribes.
 */
export async function connectStatusFeed(
	subscriber: StatusSubscriber,
	channel: string,
	watch: StatusWatch
): Promise<() => Promise<void>> {
	const onMessage = (from: string, message: string) => {
		if (from !== channel) {
			return;
		}
		const record = parseStatusMessage(message);
		if (!record) {
			return;
		}
		const version = watch.publish(record);
		log.debug({ version, playersCount: record.playersCount }, "Status updated from feed");
	};

	subscriber.on("message", onMessage);
	try {
		await subscriber.subscribe(channel);
	} catch (err) {
		subscriber.off("message", onMessage);
		throw err;
	}
	log.info({ channel }, "Subscribed to status feed");

	return async () => {
		subscriber.off("message", onMessage);
		await subscriber.unsubscribe(channel);
		log.info({ channel }, "Unsubscribed from status feed");
	};
}
