import { describe, expect, test, vi } from "vitest";
import { encodeResponse } from "./codec";
import { InvalidStatusError } from "./errors";
import { buildIdFromString, createStatusRecord } from "./status";
import { StatusWatch } from "./status-watch";

const initial = createStatusRecord({ playersCount: 1, playerCap: 10 });

describe("StatusWatch", () => {
	test("starts at version 0 with the initial record", () => {
		const watch = new StatusWatch(initial);
		expect(watch.version).toBe(0);
		expect(watch.current()).toEqual(initial);
	});

	test("rejects an invalid initial record", () => {
		expect(() => new StatusWatch(createStatusRecord({ playerCap: -1 }))).toThrow(InvalidStatusError);
	});

	test("reads after publish see the new record", () => {
		const watch = new StatusWatch(initial);
		const next = createStatusRecord({ playersCount: 2, playerCap: 10 });
		expect(watch.publish(next)).toBe(1);
		expect(watch.current()).toEqual(next);
		expect(watch.version).toBe(1);
	});

	test("never goes back to an older record", () => {
		const watch = new StatusWatch(initial);
		let lastSeen = 0;
		for (let players = 1; players <= 50; players++) {
			watch.publish(createStatusRecord({ playersCount: players, playerCap: 100 }));
			const seen = watch.current().playersCount;
			expect(seen).toBeGreaterThanOrEqual(lastSeen);
			expect(seen).toBe(players);
			lastSeen = seen;
		}
	});

	test("keeps the previous record when publish is invalid", () => {
		const watch = new StatusWatch(initial);
		expect(() => watch.publish(createStatusRecord({ playersCount: 70000 }))).toThrow(InvalidStatusError);
		expect(watch.current()).toEqual(initial);
		expect(watch.version).toBe(0);
	});

	test("publishing copies the producer's bytes", () => {
		const buildId = buildIdFromString("build-1");
		const watch = new StatusWatch(initial);
		watch.publish(createStatusRecord({ buildId }));
		buildId.fill(0);
		expect(watch.current().buildId).toEqual(buildIdFromString("build-1"));
	});

	test("writing into a read record does not change the stored one", () => {
		const watch = new StatusWatch(createStatusRecord({ buildId: buildIdFromString("build-1") }));
		const frame = encodeResponse(watch.current());
		watch.current().buildId[0] = 0x41;

		expect(watch.version).toBe(0);
		expect(watch.current().buildId).toEqual(buildIdFromString("build-1"));
		expect(encodeResponse(watch.current())).toEqual(frame);
	});

	test("listeners get their own copy of the build id", () => {
		const watch = new StatusWatch(initial);
		watch.subscribe((record) => {
			record.buildId.fill(0xff);
		});
		watch.publish(createStatusRecord({ buildId: buildIdFromString("build-2") }));
		expect(watch.current().buildId).toEqual(buildIdFromString("build-2"));
	});

	test("readers holding an old record keep it", () => {
		const watch = new StatusWatch(initial);
		const held = watch.current();
		watch.publish(createStatusRecord({ playersCount: 9, playerCap: 10 }));
		expect(held.playersCount).toBe(1);
		expect(Object.isFrozen(held)).toBe(true);
	});

	test("notifies subscribers with record and version", () => {
		const watch = new StatusWatch(initial);
		const listener = vi.fn();
		watch.subscribe(listener);
		const next = createStatusRecord({ playersCount: 4 });
		watch.publish(next);
		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(next, 1);
	});

	test("unsubscribe stops notifications", () => {
		const watch = new StatusWatch(initial);
		const listener = vi.fn();
		const unsubscribe = watch.subscribe(listener);
		unsubscribe();
		watch.publish(createStatusRecord());
		expect(listener).not.toHaveBeenCalled();
	});

	test("a throwing listener does not affect others", () => {
		const watch = new StatusWatch(initial);
		const healthy = vi.fn();
		watch.subscribe(() => {
			throw new Error("listener failed");
		});
		watch.subscribe(healthy);
		expect(watch.publish(createStatusRecord())).toBe(1);
		expect(healthy).toHaveBeenCalledTimes(1);
	});

	describe("changed", () => {
		test("resolves immediately when already newer", async () => {
			const watch = new StatusWatch(initial);
			watch.publish(createStatusRecord({ playersCount: 3 }));
			const change = await watch.changed(0);
			expect(change.version).toBe(1);
			expect(change.record.playersCount).toBe(3);
		});

		test("waits for the next publish", async () => {
			const watch = new StatusWatch(initial);
			const pending = watch.changed(watch.version);
			watch.publish(createStatusRecord({ playersCount: 7 }));
			const change = await pending;
			expect(change).toEqual({ record: watch.current(), version: 1 });
		});

		test("rejects when aborted", async () => {
			const watch = new StatusWatch(initial);
			const controller = new AbortController();
			const pending = watch.changed(0, controller.signal);
			controller.abort(new Error("stop waiting"));
			await expect(pending).rejects.toThrow("stop waiting");
		});

		test("rejects straight away with an aborted signal", async () => {
			const watch = new StatusWatch(initial);
			await expect(watch.changed(0, AbortSignal.abort(new Error("already")))).rejects.toThrow("already");
		});
	});
});
