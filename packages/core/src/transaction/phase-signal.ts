/**
 * Phase Signals
 *
 * One-shot completion signals bridging socket events to the sequential
 * transaction flow. Each transaction owns its own set.
 */

import type { TransactionPhase } from "./transaction.errors";

type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

interface Waiter<T> {
	resolve: (value: T) => void;
	reject: (error: Error) => void;
}

/**
 * Completion signal for a single transaction phase.
 *
 * The outcome is stored when it arrives before `wait()` is called, so a phase
 * that completed synchronously resolves immediately. The signal settles once;
 * later `set`/`fail` calls are ignored.
 */
export class PhaseSignal<T = void> {
	readonly phase: TransactionPhase;
	private outcome?: Outcome<T>;
	private waiter?: Waiter<T>;
	private timer?: NodeJS.Timeout;
	private released = false;

	constructor(phase: TransactionPhase) {
		this.phase = phase;
	}

	get settled(): boolean {
		return this.outcome !== undefined;
	}

	get waiting(): boolean {
		return this.waiter !== undefined;
	}

	set(value: T): void {
		this.settle({ ok: true, value });
	}

	fail(error: Error): void {
		this.settle({ ok: false, error });
	}

	/**
	 * Wait for the phase to complete.
	 * Rejects with the error built by `onTimeout` once `timeoutMs` elapses.
	 */
	wait(timeoutMs: number, onTimeout: () => Error): Promise<T> {
		if (this.released) {
			return Promise.reject(new Error(`${this.phase} signal already released`));
		}
		if (this.waiter) {
			return Promise.reject(new Error(`${this.phase} signal is already awaited`));
		}
		if (this.outcome) {
			return this.outcome.ok ? Promise.resolve(this.outcome.value) : Promise.reject(this.outcome.error);
		}

		return new Promise<T>((resolve, reject) => {
			this.waiter = { resolve, reject };
			this.timer = setTimeout(() => this.settle({ ok: false, error: onTimeout() }), timeoutMs);
		});
	}

	/**
	 * Clear the timer and reject a pending waiter. Safe to call repeatedly.
	 */
	release(): void {
		if (this.released) return;
		this.released = true;
		this.clearTimer();

		const waiter = this.waiter;
		this.waiter = undefined;
		if (!this.outcome) waiter?.reject(new Error(`${this.phase} signal released`));
	}

	private settle(outcome: Outcome<T>): void {
		if (this.outcome || this.released) return;
		this.outcome = outcome;
		this.clearTimer();

		const waiter = this.waiter;
		this.waiter = undefined;
		if (!waiter) return;

		if (outcome.ok) {
			waiter.resolve(outcome.value);
		} else {
			waiter.reject(outcome.error);
		}
	}

	private clearTimer(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
	}
}

/**
 * The three signals of one transaction
 */
export class PhaseSignals {
	readonly connect = new PhaseSignal("connect");
	readonly send = new PhaseSignal("send");
	readonly receive = new PhaseSignal<Buffer>("receive");

	/**
	 * Number of signals currently awaited (never more than one)
	 */
	get awaited(): number {
		return [this.connect, this.send, this.receive].filter((signal) => signal.waiting).length;
	}

	/**
	 * Signal for a phase, if that phase has one
	 */
	get(phase: TransactionPhase): PhaseSignal<void> | PhaseSignal<Buffer> | undefined {
		switch (phase) {
			case "connect":
				return this.connect;
			case "send":
				return this.send;
			case "receive":
				return this.receive;
			default:
				return undefined;
		}
	}

	release(): void {
		this.connect.release();
		this.send.release();
		this.receive.release();
	}
}
