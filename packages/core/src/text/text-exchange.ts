/**
 * Text Exchange
 *
 * Sends ASCII text through a `TransactionClient` and returns the reply as
 * text, with the zero padding of the receive buffer removed.
 */

import { DEFAULT_RECEIVE_BUFFER_SIZE } from "../config/config";
import type { Endpoint } from "../transaction/endpoint";
import { TransactionClient } from "../transaction/transaction.client";

export const DEFAULT_ENDPOINT: Endpoint = { address: "127.0.0.1", port: 50000 };

const REPLACEMENT = 0x3f; // "?"

/**
 * 7-bit ASCII; every UTF-16 code unit above 0x7f becomes "?"
 */
export function encodeAscii(text: string): Buffer {
	const bytes = Buffer.alloc(text.length);
	for (let i = 0; i < text.length; i++) {
		const code = text.charCodeAt(i);
		bytes[i] = code > 0x7f ? REPLACEMENT : code;
	}
	return bytes;
}

/**
 * Bytes above 0x7f decode to "?"
 */
export function decodeAscii(data: Uint8Array): string {
	const bytes = Buffer.from(data);
	for (let i = 0; i < bytes.length; i++) {
		if (bytes[i] > 0x7f) bytes[i] = REPLACEMENT;
	}
	return bytes.toString("latin1");
}

/**
 * Drop trailing zero bytes
 */
export function trimPadding(data: Uint8Array): Buffer {
	let end = data.length;
	while (end > 0 && data[end - 1] === 0) end--;
	return Buffer.from(data.buffer, data.byteOffset, end);
}

export interface TextExchangeOptions {
	client?: TransactionClient;
	endpoint?: Endpoint;
	receiveBufferSize?: number;
}

export class TextExchange {
	readonly client: TransactionClient;
	readonly endpoint: Endpoint;
	private readonly receiveBufferSize: number;

	constructor(options: TextExchangeOptions = {}) {
		this.client = options.client ?? new TransactionClient();
		this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
		this.receiveBufferSize = options.receiveBufferSize ?? DEFAULT_RECEIVE_BUFFER_SIZE;
	}

	/**
	 * @returns the reply text, or undefined when the transaction failed
	 */
	async send(text: string): Promise<string | undefined> {
		const receiveBuffer = Buffer.alloc(this.receiveBufferSize);
		const ok = await this.client.execute(this.endpoint.address, this.endpoint.port, encodeAscii(text), receiveBuffer);
		return ok ? decodeAscii(trimPadding(receiveBuffer)) : undefined;
	}
}
