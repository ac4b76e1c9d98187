import { describe, expect, test } from "vitest";
import { QueryTimeoutError, isAbortError } from "./errors";

describe("isAbortError", () => {
	test("matches the default reason of an aborted controller", () => {
		const controller = new AbortController();
		controller.abort();
		expect(isAbortError(controller.signal.reason)).toBe(true);
	});

	test("does not match a timeout signal's reason", () => {
		expect(isAbortError(new DOMException("The operation timed out.", "TimeoutError"))).toBe(false);
	});

	test("does not match other errors", () => {
		expect(isAbortError(new QueryTimeoutError(10))).toBe(false);
		expect(isAbortError(new Error("AbortError"))).toBe(false);
		expect(isAbortError("AbortError")).toBe(false);
		expect(isAbortError(null)).toBe(false);
	});
});
