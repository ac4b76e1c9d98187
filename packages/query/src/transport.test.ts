import { describe, expect, test } from "vitest";
import { TransportFatalError } from "./errors";
import { MemoryNetwork } from "./memory-transport";
import { DatagramQueue, formatPeer, sameAddress } from "./transport";
import type { Datagram } from "./types";

function datagram(byte: number): Datagram {
	return { data: new Uint8Array([byte]), peer: { address: "10.0.0.1", port: 4000 } };
}

describe("DatagramQueue", () => {
	test("hands queued datagrams out in order", async () => {
		const queue = new DatagramQueue();
		queue.push(datagram(1));
		queue.push(datagram(2));
		expect((await queue.next()).data[0]).toBe(1);
		expect((await queue.next()).data[0]).toBe(2);
	});

	test("wakes a waiting receiver", async () => {
		const queue = new DatagramQueue();
		const pending = queue.next();
		queue.push(datagram(7));
		expect((await pending).data[0]).toBe(7);
	});

	test("drops the oldest datagram when full", async () => {
		const queue = new DatagramQueue(2);
		expect(queue.push(datagram(1))).toBe(true);
		expect(queue.push(datagram(2))).toBe(true);
		expect(queue.push(datagram(3))).toBe(false);
		expect(queue.dropped).toBe(1);
		expect((await queue.next()).data[0]).toBe(2);
	});

	test("fails pending and later receives", async () => {
		const queue = new DatagramQueue();
		const pending = queue.next();
		queue.fail(new TransportFatalError("gone"));
		await expect(pending).rejects.toThrow(TransportFatalError);
		await expect(queue.next()).rejects.toThrow("gone");
		expect(queue.closed).toBe(true);
	});

	test("abort removes the waiter", async () => {
		const queue = new DatagramQueue();
		const controller = new AbortController();
		const pending = queue.next(controller.signal);
		controller.abort(new Error("cancelled"));
		await expect(pending).rejects.toThrow("cancelled");
		queue.push(datagram(5));
		expect((await queue.next()).data[0]).toBe(5);
	});
});

describe("sameAddress", () => {
	test("matches IPv4-mapped IPv6 peers", () => {
		expect(sameAddress({ address: "::ffff:127.0.0.1", port: 1 }, { address: "127.0.0.1", port: 1 })).toBe(
			true
		);
	});

	test("ports must match", () => {
		expect(sameAddress({ address: "127.0.0.1", port: 1 }, { address: "127.0.0.1", port: 2 })).toBe(false);
	});
});

describe("formatPeer", () => {
	test("brackets IPv6 addresses", () => {
		expect(formatPeer({ address: "::1", port: 14006 })).toBe("[::1]:14006");
		expect(formatPeer({ address: "127.0.0.1", port: 14006 })).toBe("127.0.0.1:14006");
	});
});

describe("MemoryNetwork", () => {
	test("delivers between endpoints with the sender's address", async () => {
		const network = new MemoryNetwork();
		const a = await network.bind({ address: "10.0.0.1", port: 5000 });
		const b = await network.bind({ address: "10.0.0.2", port: 6000 });
		await a.send(b.localAddress, new Uint8Array([1, 2, 3]));
		const received = await b.receive();
		expect(received.data).toEqual(new Uint8Array([1, 2, 3]));
		expect(received.peer).toEqual({ address: "10.0.0.1", port: 5000 });
	});

	test("wildcard endpoints receive for any address and send from loopback", async () => {
		const network = new MemoryNetwork();
		const server = await network.bind({ address: "0.0.0.0", port: 14006 });
		const client = await network.bind({ address: "0.0.0.0", port: 0 });
		await client.send({ address: "127.0.0.1", port: 14006 }, new Uint8Array([7]));
		const received = await server.receive();
		expect(received.peer).toEqual({ address: "127.0.0.1", port: 49152 });
	});

	test("assigns ephemeral ports", async () => {
		const network = new MemoryNetwork();
		const first = await network.bind({ address: "0.0.0.0", port: 0 });
		const second = await network.bind({ address: "0.0.0.0", port: 0 });
		expect(first.localAddress.port).toBe(49152);
		expect(second.localAddress.port).toBe(49153);
	});

	test("refuses an address in use", async () => {
		const network = new MemoryNetwork();
		await network.bind({ address: "10.0.0.1", port: 5000 });
		await expect(network.bind({ address: "10.0.0.1", port: 5000 })).rejects.toThrow(
			"Address already in use: 10.0.0.1:5000"
		);
	});

	test("frees the address on close", async () => {
		const network = new MemoryNetwork();
		const endpoint = await network.bind({ address: "10.0.0.1", port: 5000 });
		await endpoint.close();
		await expect(network.bind({ address: "10.0.0.1", port: 5000 })).resolves.toBeDefined();
	});

	test("closed endpoints cannot send or receive", async () => {
		const network = new MemoryNetwork();
		const endpoint = await network.bind({ address: "10.0.0.1", port: 5000 });
		await endpoint.close();
		await expect(endpoint.send({ address: "10.0.0.2", port: 1 }, new Uint8Array([1]))).rejects.toThrow(
			TransportFatalError
		);
		await expect(endpoint.receive()).rejects.toThrow(TransportFatalError);
	});

	test("datagrams to nobody vanish", async () => {
		const network = new MemoryNetwork();
		const a = await network.bind({ address: "10.0.0.1", port: 5000 });
		await a.send({ address: "10.0.0.9", port: 9 }, new Uint8Array([1]));
		expect(network.sent).toBe(1);
	});
});
