/**
 * Transaction
 *
 * One connect → send → receive cycle over a fresh socket. Socket events are
 * dispatched onto per-phase signals and the phases are awaited strictly in
 * order, each with its own deadline.
 */

import type { ResolvedClientConfig } from "../config/config";
import type { ResolvedEndpoint } from "./endpoint";
import { PhaseSignals } from "./phase-signal";
import {
	ConnectTimeoutError,
	ReceiveTimeoutError,
	SendTimeoutError,
	type TransactionPhase,
	TransportError,
} from "./transaction.errors";
import type { TransactionSocket } from "./transaction.types";

/**
 * Upper bound on the half-close handshake before the socket is destroyed
 */
export const CLOSE_GRACE_MS = 1000;

type TransactionTimeouts = Pick<
	ResolvedClientConfig,
	"connectTimeoutMs" | "sendTimeoutMs" | "receiveTimeoutMs" | "sendMode" | "noDelay" | "socketFactory"
>;

export class Transaction {
	private readonly signals = new PhaseSignals();
	private socket: TransactionSocket | null = null;
	private _phase: TransactionPhase = "connect";
	private _bytesSent = 0;
	private connected = false;
	private closed = false;
	private graceTimer?: NodeJS.Timeout;

	constructor(
		readonly endpoint: ResolvedEndpoint,
		private readonly payload: Uint8Array,
		private readonly capacity: number,
		private readonly config: TransactionTimeouts,
	) {}

	/**
	 * Phase currently in progress (or the one that failed)
	 */
	get phase(): TransactionPhase {
		return this._phase;
	}

	/**
	 * Payload bytes acknowledged by the socket
	 */
	get bytesSent(): number {
		return this._bytesSent;
	}

	/**
	 * Phase signals currently awaited
	 */
	get awaitedSignals(): number {
		return this.signals.awaited;
	}

	/**
	 * Run all phases. Resolves with the reply (at most `capacity` bytes).
	 * The caller must call `close()` afterwards, whatever the outcome; closing
	 * while running rejects the pending phase.
	 */
	async run(): Promise<Buffer> {
		if (this.closed) throw new Error("transaction already closed");
		if (this.socket) throw new Error("transaction already started");

		const { connectTimeoutMs, sendTimeoutMs, receiveTimeoutMs, sendMode } = this.config;
		const socket = this.config.socketFactory(this.endpoint);
		this.socket = socket;
		this.attach(socket);

		socket.setNoDelay(this.config.noDelay);
		socket.connect(this.endpoint.port, this.endpoint.address);

		// Written while connecting: flushed as soon as the connection is up
		if (sendMode === "bundled") this.send(socket);

		await this.signals.connect.wait(connectTimeoutMs, () => new ConnectTimeoutError(connectTimeoutMs));

		if (sendMode === "separate") {
			this._phase = "send";
			this.send(socket);
			await this.signals.send.wait(sendTimeoutMs, () => new SendTimeoutError(sendTimeoutMs));
		}

		this._phase = "receive";
		const reply = await this.signals.receive.wait(receiveTimeoutMs, () => new ReceiveTimeoutError(receiveTimeoutMs));
		return reply.subarray(0, this.capacity);
	}

	/**
	 * Release the phase signals and shut the socket down.
	 * A connected socket is half-closed first and destroyed once the FIN is
	 * flushed, or after `CLOSE_GRACE_MS`. Runs once; repeated calls do nothing.
	 */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		this.signals.release();

		const socket = this.socket;
		if (!socket || socket.destroyed) return;
		if (!this.connected) {
			socket.destroy();
			return;
		}

		this.graceTimer = setTimeout(() => socket.destroy(), CLOSE_GRACE_MS);
		this.graceTimer.unref();
		socket.end(() => {
			this.clearGraceTimer();
			socket.destroy();
		});
	}

	private clearGraceTimer(): void {
		if (this.graceTimer) {
			clearTimeout(this.graceTimer);
			this.graceTimer = undefined;
		}
	}

	private send(socket: TransactionSocket): void {
		// Write errors are also emitted as "error" and handled there
		socket.write(this.payload, (err) => {
			if (err) return;
			this._bytesSent = this.payload.length;
			this.signals.send.set();
		});
	}

	/**
	 * Single completion dispatcher: maps socket events onto phase signals
	 */
	private attach(socket: TransactionSocket): void {
		socket.on("connect", () => {
			this.connected = true;
			this.signals.connect.set();
		});
		socket.on("data", (chunk) => this.signals.receive.set(chunk));
		// Peer closed its side without replying
		socket.on("end", () => this.signals.receive.set(Buffer.alloc(0)));
		socket.on("error", (err) => this.signals.get(this._phase)?.fail(TransportError.from(err, this._phase)));
		socket.on("close", () => {
			this.clearGraceTimer();
			this.signals.get(this._phase)?.fail(new TransportError("connection closed", this._phase));
		});
	}
}
