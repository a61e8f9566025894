/**
 * Environment Configuration
 *
 * Reads client settings from environment variables.
 */

import type { SendMode, TransactionClientConfig } from "./config";

export const ENV_PREFIX = "ONESHOT_";

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string): number | undefined {
	const raw = env[ENV_PREFIX + name];
	if (raw === undefined || raw === "") return undefined;

	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`${ENV_PREFIX}${name} must be a positive integer, got "${raw}"`);
	}
	return value;
}

function readSendMode(env: Env): SendMode | undefined {
	const raw = env[`${ENV_PREFIX}SEND_MODE`];
	if (raw === undefined || raw === "") return undefined;
	if (raw === "bundled" || raw === "separate") return raw;
	throw new Error(`${ENV_PREFIX}SEND_MODE must be "bundled" or "separate", got "${raw}"`);
}

function readBoolean(env: Env, name: string): boolean | undefined {
	const raw = env[ENV_PREFIX + name];
	if (raw === undefined || raw === "") return undefined;
	switch (raw.toLowerCase()) {
		case "1":
		case "true":
		case "yes":
			return true;
		case "0":
		case "false":
		case "no":
			return false;
		default:
			throw new Error(`${ENV_PREFIX}${name} must be a boolean, got "${raw}"`);
	}
}

/**
 * Get client config from environment variables.
 * Unset variables are left out so defaults apply.
 */
export function loadConfigFromEnv(env: Env = process.env): TransactionClientConfig {
	const config: TransactionClientConfig = {};

	const connectTimeoutMs = readPositiveInt(env, "CONNECT_TIMEOUT_MS");
	if (connectTimeoutMs !== undefined) config.connectTimeoutMs = connectTimeoutMs;

	const sendTimeoutMs = readPositiveInt(env, "SEND_TIMEOUT_MS");
	if (sendTimeoutMs !== undefined) config.sendTimeoutMs = sendTimeoutMs;

	const receiveTimeoutMs = readPositiveInt(env, "RECEIVE_TIMEOUT_MS");
	if (receiveTimeoutMs !== undefined) config.receiveTimeoutMs = receiveTimeoutMs;

	const receiveBufferSize = readPositiveInt(env, "RECEIVE_BUFFER_SIZE");
	if (receiveBufferSize !== undefined) config.receiveBufferSize = receiveBufferSize;

	const sendMode = readSendMode(env);
	if (sendMode !== undefined) config.sendMode = sendMode;

	const showAlerts = readBoolean(env, "SHOW_ALERTS");
	if (showAlerts !== undefined) config.showAlerts = showAlerts;

	return config;
}
