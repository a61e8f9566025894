/**
 * Phase Signal Unit Tests
 */

import { ConnectTimeoutError, PhaseSignal, PhaseSignals, ReceiveTimeoutError } from "oneshot-tcp";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("PhaseSignal", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("should resolve a waiter when set", async () => {
		const signal = new PhaseSignal<string>("receive");
		const pending = signal.wait(100, () => new ReceiveTimeoutError(100));

		expect(signal.waiting).toBe(true);
		signal.set("reply");

		await expect(pending).resolves.toBe("reply");
		expect(signal.waiting).toBe(false);
		expect(signal.settled).toBe(true);
	});

	it("should resolve immediately when completed before wait", async () => {
		const signal = new PhaseSignal("connect");
		signal.set();

		await expect(signal.wait(100, () => new ConnectTimeoutError(100))).resolves.toBeUndefined();
		expect(vi.getTimerCount()).toBe(0);
	});

	it("should reject with the stored failure", async () => {
		const signal = new PhaseSignal("connect");
		signal.fail(new Error("refused"));

		await expect(signal.wait(100, () => new ConnectTimeoutError(100))).rejects.toThrow("refused");
	});

	it("should reject with the timeout error when the deadline passes", async () => {
		const signal = new PhaseSignal("connect");
		const pending = signal.wait(250, () => new ConnectTimeoutError(250));
		const assertion = expect(pending).rejects.toBeInstanceOf(ConnectTimeoutError);

		await vi.advanceTimersByTimeAsync(250);
		await assertion;
		expect(signal.settled).toBe(true);
	});

	it("should not time out before the deadline", async () => {
		const signal = new PhaseSignal<number>("receive");
		const pending = signal.wait(1000, () => new ReceiveTimeoutError(1000));

		await vi.advanceTimersByTimeAsync(999);
		signal.set(7);

		await expect(pending).resolves.toBe(7);
		expect(vi.getTimerCount()).toBe(0);
	});

	it("should keep the first outcome only", async () => {
		const signal = new PhaseSignal<number>("receive");
		signal.set(1);
		signal.set(2);
		signal.fail(new Error("late"));

		await expect(signal.wait(10, () => new ReceiveTimeoutError(10))).resolves.toBe(1);
	});

	it("should reject a pending waiter on release", async () => {
		const signal = new PhaseSignal<Buffer>("receive");
		const pending = signal.wait(50, () => new ReceiveTimeoutError(50));
		const onRejected = vi.fn();
		void pending.catch(onRejected);

		signal.release();

		await expect(pending).rejects.toThrow("receive signal released");
		await vi.advanceTimersByTimeAsync(100);
		expect(onRejected).toHaveBeenCalledTimes(1);
		expect(signal.waiting).toBe(false);
	});

	it("should reject a second concurrent wait", async () => {
		const signal = new PhaseSignal("connect");
		const first = signal.wait(100, () => new ConnectTimeoutError(100));

		await expect(signal.wait(100, () => new ConnectTimeoutError(100))).rejects.toThrow(
			"connect signal is already awaited",
		);

		signal.set();
		await expect(first).resolves.toBeUndefined();
	});

	it("should clear its timer and ignore completions after release", async () => {
		const signal = new PhaseSignal("connect");
		const pending = signal.wait(100, () => new ConnectTimeoutError(100));
		expect(vi.getTimerCount()).toBe(1);

		signal.release();
		signal.release();
		signal.set();

		await expect(pending).rejects.toThrow("connect signal released");
		expect(vi.getTimerCount()).toBe(0);
		expect(signal.settled).toBe(false);
		await expect(signal.wait(100, () => new ConnectTimeoutError(100))).rejects.toThrow(
			"connect signal already released",
		);
	});
});

describe("PhaseSignals", () => {
	it("should map phases to their signals", () => {
		const signals = new PhaseSignals();

		expect(signals.get("connect")).toBe(signals.connect);
		expect(signals.get("send")).toBe(signals.send);
		expect(signals.get("receive")).toBe(signals.receive);
		expect(signals.get("validation")).toBeUndefined();
	});

	it("should count awaited signals", async () => {
		const signals = new PhaseSignals();
		expect(signals.awaited).toBe(0);

		const pending = signals.connect.wait(1000, () => new ConnectTimeoutError(1000));
		expect(signals.awaited).toBe(1);

		signals.connect.set();
		await pending;
		expect(signals.awaited).toBe(0);
		signals.release();
	});

	it("should release every signal", () => {
		const signals = new PhaseSignals();
		signals.release();
		signals.connect.set();
		signals.receive.set(Buffer.from("x"));

		expect(signals.connect.settled).toBe(false);
		expect(signals.receive.settled).toBe(false);
	});
});
