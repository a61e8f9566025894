/**
 * Transaction Client
 *
 * Bounded TCP request/response exchange: each call opens a fresh connection,
 * sends one payload, reads one reply and closes the connection again.
 * Failures never reject; they are reported and turn into `false`.
 *
 * @example
 * ```typescript
 * const client = new TransactionClient({ log: (line) => console.log(line) });
 * const reply = Buffer.alloc(1024);
 *
 * if (await client.execute("127.0.0.1", 50000, Buffer.from("PING"), reply)) {
 *   console.log(trimPadding(reply).toString("ascii"));
 * }
 * ```
 */

import { type ResolvedClientConfig, resolveConfig, type TransactionClientConfig } from "../config/config";
import { createReporter, type TransactionReporter } from "../reporting/reporter";
import { type Endpoint, parseEndpoint, type ResolvedEndpoint } from "./endpoint";
import { Transaction } from "./transaction";
import { InvalidInputError, type TransactionError, toTransactionError } from "./transaction.errors";
import type { TransactionResult } from "./transaction.types";

export interface TransactOptions {
	receiveBufferSize?: number;
}

const EMPTY: Buffer = Buffer.alloc(0);

export class TransactionClient {
	readonly config: ResolvedClientConfig;
	readonly reporter: TransactionReporter;

	constructor(cfg: TransactionClientConfig = {}) {
		this.config = resolveConfig(cfg);
		this.reporter =
			cfg.reporter ?? createReporter({ log: cfg.log, alert: cfg.alert, showAlerts: this.config.showAlerts });
	}

	/**
	 * Send `sendPayload` to `address:port` and read the reply into `receiveBuffer`.
	 *
	 * On success the reply occupies the start of the buffer and the rest is
	 * zero-filled; replies longer than the buffer are truncated. On failure the
	 * buffer is left untouched.
	 *
	 * @returns true when every phase completed in time
	 */
	async execute(address: string, port: number, sendPayload: Uint8Array, receiveBuffer: Uint8Array): Promise<boolean> {
		if (receiveBuffer.length === 0) {
			return this.reject(new InvalidInputError("receive buffer has no capacity")).success;
		}

		const result = await this.run(address, port, sendPayload, receiveBuffer.length);
		if (result.success) {
			receiveBuffer.set(result.received);
			receiveBuffer.fill(0, result.received.length);
		}
		return result.success;
	}

	/**
	 * Same exchange as `execute`, with a buffer allocated per call.
	 * `received` holds only the bytes actually read.
	 */
	transact(endpoint: Endpoint, sendPayload: Uint8Array, options: TransactOptions = {}): Promise<TransactionResult> {
		const capacity = options.receiveBufferSize ?? this.config.receiveBufferSize;
		if (!Number.isInteger(capacity) || capacity <= 0) {
			return Promise.resolve(this.reject(new InvalidInputError(`invalid receive buffer size: ${capacity}`)));
		}
		return this.run(endpoint.address, endpoint.port, sendPayload, capacity);
	}

	private async run(address: string, port: number, payload: Uint8Array, capacity: number): Promise<TransactionResult> {
		let endpoint: ResolvedEndpoint;
		try {
			endpoint = parseEndpoint(address, port);
			if (payload.length === 0) throw new InvalidInputError("no data to send");
		} catch (error) {
			return this.reject(toTransactionError(error, "validation"));
		}

		const transaction = new Transaction(endpoint, payload, capacity, this.config);
		const startTime = Date.now();
		let received: Buffer = EMPTY;
		let failure: TransactionError | undefined;

		try {
			received = await transaction.run();
		} catch (error) {
			failure = toTransactionError(error, transaction.phase);
		} finally {
			transaction.close();
		}

		if (failure) this.reporter.report(failure);
		this.reporter.onComplete?.({
			endpoint: { address: endpoint.address, port: endpoint.port },
			success: !failure,
			bytesSent: transaction.bytesSent,
			bytesReceived: received.length,
			duration: Date.now() - startTime,
			error: failure,
		});

		return failure ? { success: false, received: EMPTY, error: failure } : { success: true, received };
	}

	private reject(error: TransactionError): TransactionResult {
		this.reporter.report(error);
		return { success: false, received: EMPTY, error };
	}
}
