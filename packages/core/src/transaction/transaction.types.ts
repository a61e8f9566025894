/**
 * Transaction Types
 */

import type { Endpoint, ResolvedEndpoint } from "./endpoint";
import type { TransactionError } from "./transaction.errors";

/**
 * Result of `TransactionClient.transact()`
 */
export interface TransactionResult {
	success: boolean;
	/** Reply bytes actually read (empty on failure) */
	received: Buffer;
	error?: TransactionError;
}

/**
 * Summary handed to reporters once a transaction finishes
 */
export interface TransactionSummary {
	endpoint: Endpoint;
	success: boolean;
	bytesSent: number;
	bytesReceived: number;
	duration: number; // ms
	error?: TransactionError;
}

/**
 * Minimal socket surface used by the client.
 * `net.Socket` satisfies it; tests substitute fakes.
 */
export interface TransactionSocket {
	readonly destroyed: boolean;
	connect(port: number, host: string): unknown;
	write(data: Uint8Array, callback?: (err?: Error | null) => void): boolean;
	setNoDelay(noDelay?: boolean): unknown;
	end(callback?: () => void): unknown;
	destroy(): unknown;
	on(event: "connect" | "end" | "close", listener: () => void): unknown;
	on(event: "data", listener: (chunk: Buffer) => void): unknown;
	on(event: "error", listener: (err: Error) => void): unknown;
}

export type SocketFactory = (endpoint: ResolvedEndpoint) => TransactionSocket;
