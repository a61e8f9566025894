import { isIP } from "node:net";
import { InvalidInputError } from "./transaction.errors";

/**
 * Remote endpoint of a transaction
 */
export interface Endpoint {
	address: string; // IPv4 or IPv6 literal
	port: number;
}

/**
 * Endpoint after validation
 */
export interface ResolvedEndpoint extends Endpoint {
	family: 4 | 6;
}

export function isValidAddress(address: string): boolean {
	return isIP(address) !== 0;
}

export function isValidPort(port: number): boolean {
	return Number.isInteger(port) && port > 0 && port <= 65535;
}

/**
 * Validate address and port.
 * Host names are rejected: the client never resolves names.
 */
export function parseEndpoint(address: string, port: number): ResolvedEndpoint {
	const family = isIP(address);
	if (family !== 4 && family !== 6) {
		throw new InvalidInputError(`invalid IP address: ${address}`);
	}
	if (!isValidPort(port)) {
		throw new InvalidInputError(`invalid port: ${port}`);
	}
	return { address, port, family };
}

export function formatEndpoint(endpoint: Endpoint): string {
	return isIP(endpoint.address) === 6 ? `[${endpoint.address}]:${endpoint.port}` : `${endpoint.address}:${endpoint.port}`;
}
