/**
 * Transaction Errors
 *
 * Failure taxonomy for a single connect → send → receive cycle.
 * None of these escape `TransactionClient`; they are reported and turned into
 * a `false` result.
 */

/**
 * Failure kind, one per error class
 */
export type TransactionErrorKind =
	| "invalid-input"
	| "connect-timeout"
	| "send-timeout"
	| "receive-timeout"
	| "transport";

/**
 * Transaction phase a failure happened in.
 * "validation" covers input checks that run before any socket exists.
 */
export type TransactionPhase = "validation" | "connect" | "send" | "receive";

/**
 * Base class of every transaction failure
 */
export abstract class TransactionError extends Error {
	abstract readonly kind: TransactionErrorKind;

	readonly phase: TransactionPhase;

	constructor(message: string, phase: TransactionPhase, options?: { cause?: Error }) {
		super(message, { cause: options?.cause });
		this.name = "TransactionError";
		this.phase = phase;
	}
}

/**
 * Bad address, port or payload. Raised before any network activity.
 */
export class InvalidInputError extends TransactionError {
	readonly kind = "invalid-input";

	constructor(message: string) {
		super(message, "validation");
		this.name = "InvalidInputError";
	}
}

/**
 * Base for phase deadline failures
 */
export abstract class PhaseTimeoutError extends TransactionError {
	readonly timeoutMs: number;

	constructor(message: string, phase: TransactionPhase, timeoutMs: number) {
		super(message, phase);
		this.timeoutMs = timeoutMs;
	}
}

export class ConnectTimeoutError extends PhaseTimeoutError {
	readonly kind = "connect-timeout";

	constructor(timeoutMs: number) {
		super(`connection not established within ${timeoutMs}ms`, "connect", timeoutMs);
		this.name = "ConnectTimeoutError";
	}
}

/**
 * Only raised when the payload is sent as its own phase (`sendMode: "separate"`).
 */
export class SendTimeoutError extends PhaseTimeoutError {
	readonly kind = "send-timeout";

	constructor(timeoutMs: number) {
		super(`data not sent within ${timeoutMs}ms`, "send", timeoutMs);
		this.name = "SendTimeoutError";
	}
}

export class ReceiveTimeoutError extends PhaseTimeoutError {
	readonly kind = "receive-timeout";

	constructor(timeoutMs: number) {
		super(`no data received within ${timeoutMs}ms`, "receive", timeoutMs);
		this.name = "ReceiveTimeoutError";
	}
}

/**
 * Any other socket-level failure (refused, reset, unreachable, ...).
 * Keeps the system error code when the socket provided one.
 */
export class TransportError extends TransactionError {
	readonly kind = "transport";

	readonly code?: string;

	constructor(message: string, phase: TransactionPhase, options?: { cause?: Error; code?: string }) {
		super(message, phase, options);
		this.name = "TransportError";
		this.code = options?.code;
	}

	/**
	 * Wrap an arbitrary thrown value
	 */
	static from(error: unknown, phase: TransactionPhase): TransportError {
		if (error instanceof Error) {
			const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
			return new TransportError(error.message, phase, { cause: error, code });
		}
		return new TransportError(String(error), phase);
	}
}

/**
 * Normalize anything caught inside a transaction into a `TransactionError`
 */
export function toTransactionError(error: unknown, phase: TransactionPhase): TransactionError {
	return error instanceof TransactionError ? error : TransportError.from(error, phase);
}
