export type QueryErrorCode = "MALFORMED_MESSAGE" | "INVALID_STATUS" | "TIMEOUT" | "TRANSPORT_FATAL";

export class QueryError extends Error {
	readonly code: QueryErrorCode;

	constructor(code: QueryErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "QueryError";
		this.code = code;
	}
}

/**
 * Bytes that are not a valid protocol message: truncated, wrong version,
 * out-of-range field or unknown tag.
 */
export class MalformedMessageError extends QueryError {
	constructor(message: string) {
		super("MALFORMED_MESSAGE", message);
		this.name = "MalformedMessageError";
	}
}

/**
 * A status record that cannot be published or put on the wire.
 */
export class InvalidStatusError extends QueryError {
	constructor(message: string) {
		super("INVALID_STATUS", message);
		this.name = "InvalidStatusError";
	}
}

export class QueryTimeoutError extends QueryError {
	readonly timeoutMs: number;

	constructor(timeoutMs: number) {
		super("TIMEOUT", `No response after ${timeoutMs}ms`);
		this.name = "QueryTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

/**
 * The transport can no longer send or receive. Not recoverable by the component that hit it.
 */
export class TransportFatalError extends QueryError {
	constructor(message: string, options?: ErrorOptions) {
		super("TRANSPORT_FATAL", message, options);
		this.name = "TransportFatalError";
	}
}

/**
 * Matches both `DOMException` abort reasons and Node's `AbortError`
 */
export function isAbortError(error: unknown): boolean {
	return typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";
}
