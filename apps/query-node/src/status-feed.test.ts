import { EventEmitter } from "node:events";
import { StatusWatch, buildIdToString, createStatusRecord } from "@beacon/query";
import { describe, expect, test, vi } from "vitest";
import { type StatusSubscriber, connectStatusFeed, parseStatusMessage } from "./status-feed";

const CHANNEL = "beacon:status";

class FakeSubscriber extends EventEmitter implements StatusSubscriber {
	readonly channels = new Set<string>();
	failSubscribe = false;

	async subscribe(channel: string): Promise<number> {
		if (this.failSubscribe) {
			throw new Error("Connection is closed.");
		}
		this.channels.add(channel);
		return this.channels.size;
	}

	async unsubscribe(channel: string): Promise<number> {
		this.channels.delete(channel);
		return this.channels.size;
	}
}

const message = (fields: Record<string, unknown>) =>
	JSON.stringify({ buildId: "v2", playersCount: 7, playerCap: 64, battleMode: { kind: "global-pvp" }, ...fields });

describe("parseStatusMessage", () => {
	test("turns a valid message into a record", () => {
		const record = parseStatusMessage(message({}));
		expect(record).not.toBeNull();
		expect(record?.playersCount).toBe(7);
		expect(record?.playerCap).toBe(64);
		expect(record?.battleMode).toEqual({ kind: "global-pvp" });
		expect(record && buildIdToString(record.buildId)).toBe("v2");
	});

	test("returns null for invalid JSON", () => {
		expect(parseStatusMessage("{nope")).toBeNull();
	});

	test("returns null for a build id wider than 8 bytes", () => {
		expect(parseStatusMessage(message({ buildId: "\u00e9\u00e9\u00e9\u00e9\u00e9" }))).toBeNull();
	});

	test("returns null for out-of-range counts", () => {
		expect(parseStatusMessage(message({ playersCount: 70000 }))).toBeNull();
	});

	test("returns null for an unknown battle mode", () => {
		expect(parseStatusMessage(message({ battleMode: { kind: "arena" } }))).toBeNull();
	});
});

describe("connectStatusFeed", () => {
	test("publishes valid messages into the watch", async () => {
		const subscriber = new FakeSubscriber();
		const watch = new StatusWatch(createStatusRecord());
		await connectStatusFeed(subscriber, CHANNEL, watch);
		expect(subscriber.channels.has(CHANNEL)).toBe(true);

		subscriber.emit("message", CHANNEL, message({ playersCount: 9 }));
		expect(watch.version).toBe(1);
		expect(watch.current().playersCount).toBe(9);
	});

	test("keeps the last good record on bad messages", async () => {
		const subscriber = new FakeSubscriber();
		const watch = new StatusWatch(createStatusRecord());
		await connectStatusFeed(subscriber, CHANNEL, watch);

		subscriber.emit("message", CHANNEL, message({ playersCount: 9 }));
		subscriber.emit("message", CHANNEL, "not json");
		subscriber.emit("message", CHANNEL, message({ playerCap: -1 }));
		expect(watch.version).toBe(1);
		expect(watch.current().playersCount).toBe(9);
	});

	test("ignores other channels", async () => {
		const subscriber = new FakeSubscriber();
		const watch = new StatusWatch(createStatusRecord());
		await connectStatusFeed(subscriber, CHANNEL, watch);

		subscriber.emit("message", "other", message({ playersCount: 9 }));
		expect(watch.version).toBe(0);
	});

	test("stops publishing after unsubscribe", async () => {
		const subscriber = new FakeSubscriber();
		const watch = new StatusWatch(createStatusRecord());
		const stop = await connectStatusFeed(subscriber, CHANNEL, watch);
		await stop();

		expect(subscriber.channels.size).toBe(0);
		expect(subscriber.listenerCount("message")).toBe(0);
		subscriber.emit("message", CHANNEL, message({ playersCount: 9 }));
		expect(watch.version).toBe(0);
	});

	test("removes its listener when subscribing fails", async () => {
		const subscriber = new FakeSubscriber();
		subscriber.failSubscribe = true;
		const publish = vi.spyOn(StatusWatch.prototype, "publish");

		await expect(
			connectStatusFeed(subscriber, CHANNEL, new StatusWatch(createStatusRecord()))
		).rejects.toThrow("Connection is closed.");
		expect(subscriber.listenerCount("message")).toBe(0);
		expect(publish).not.toHaveBeenCalled();
		publish.mockRestore();
	});
});
