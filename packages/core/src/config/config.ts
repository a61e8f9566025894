/**
 * Client Configuration
 *
 * Configuration interface for `TransactionClient` and its defaults.
 */

import { Socket } from "node:net";
import type { AlertCallback, LogCallback, TransactionReporter } from "../reporting/reporter";
import type { SocketFactory } from "../transaction/transaction.types";

/**
 * Default deadline of every phase
 */
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Default receive buffer capacity
 */
export const DEFAULT_RECEIVE_BUFFER_SIZE = 1024;

/**
 * How the payload is sent:
 * - "bundled": written together with the connect request and flushed as part
 *   of the connect phase (default)
 * - "separate": written after connect as its own phase with `sendTimeoutMs`
 */
export type SendMode = "bundled" | "separate";

export interface TransactionClientConfig {
	connectTimeoutMs?: number; // Connect phase deadline
	sendTimeoutMs?: number; // Send phase deadline (separate send mode only)
	receiveTimeoutMs?: number; // Receive phase deadline
	sendMode?: SendMode;
	receiveBufferSize?: number; // Buffer capacity used by `transact()`
	noDelay?: boolean; // Disable Nagle's algorithm
	log?: LogCallback; // Logging callback
	alert?: AlertCallback; // Blocking user alert
	showAlerts?: boolean; // Fire `alert` on failures
	reporter?: TransactionReporter; // Overrides log/alert/showAlerts
	socketFactory?: SocketFactory;
}

export type ResolvedClientConfig = Required<
	Pick<
		TransactionClientConfig,
		| "connectTimeoutMs"
		| "sendTimeoutMs"
		| "receiveTimeoutMs"
		| "sendMode"
		| "receiveBufferSize"
		| "noDelay"
		| "showAlerts"
		| "socketFactory"
	>
>;

export const createNetSocket: SocketFactory = () => new Socket();

/**
 * Fill in defaults and check numeric options
 */
export function resolveConfig(cfg: TransactionClientConfig = {}): ResolvedClientConfig {
	const config: ResolvedClientConfig = {
		connectTimeoutMs: cfg.connectTimeoutMs ?? DEFAULT_TIMEOUT_MS,
		sendTimeoutMs: cfg.sendTimeoutMs ?? DEFAULT_TIMEOUT_MS,
		receiveTimeoutMs: cfg.receiveTimeoutMs ?? DEFAULT_TIMEOUT_MS,
		sendMode: cfg.sendMode ?? "bundled",
		receiveBufferSize: cfg.receiveBufferSize ?? DEFAULT_RECEIVE_BUFFER_SIZE,
		noDelay: cfg.noDelay ?? true,
		showAlerts: cfg.showAlerts ?? false,
		socketFactory: cfg.socketFactory ?? createNetSocket,
	};

	for (const key of ["connectTimeoutMs", "sendTimeoutMs", "receiveTimeoutMs", "receiveBufferSize"] as const) {
		if (!Number.isInteger(config[key]) || config[key] <= 0) {
			throw new Error(`${key} must be a positive integer, got ${config[key]}`);
		}
	}

	return config;
}
