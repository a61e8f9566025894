/**
 * Reporter Unit Tests
 */

import {
	AlertReporter,
	ConnectTimeoutError,
	ConsoleReporter,
	createReporter,
	formatFailure,
	InvalidInputError,
	LogReporter,
	ReceiveTimeoutError,
	SendTimeoutError,
	SilentReporter,
	TransportError,
} from "oneshot-tcp";
import { afterEach, describe, expect, it, vi } from "vitest";

describe("formatFailure", () => {
	it("should prefix the error category", () => {
		expect(formatFailure(new InvalidInputError("invalid IP address: x"))).toBe("invalid input: invalid IP address: x");
		expect(formatFailure(new ConnectTimeoutError(10000))).toBe(
			"connect timeout: connection not established within 10000ms",
		);
		expect(formatFailure(new SendTimeoutError(5))).toBe("send timeout: data not sent within 5ms");
		expect(formatFailure(new ReceiveTimeoutError(20))).toBe("receive timeout: no data received within 20ms");
		expect(formatFailure(new TransportError("read ECONNRESET", "receive"))).toBe("transport error: read ECONNRESET");
	});
});

describe("LogReporter", () => {
	it("should pass one formatted line to the callback", () => {
		const log = vi.fn();
		const reporter = new LogReporter(log);

		reporter.report(new ReceiveTimeoutError(100));

		expect(log).toHaveBeenCalledTimes(1);
		expect(log).toHaveBeenCalledWith("receive timeout: no data received within 100ms");
	});
});

describe("AlertReporter", () => {
	it("should log and raise an alert", () => {
		const log = vi.fn();
		const alert = vi.fn();
		const reporter = new AlertReporter(log, alert);

		reporter.report(new TransportError("connect ECONNREFUSED 127.0.0.1:9", "connect"));
		reporter.report(new InvalidInputError("no data to send"));

		expect(log.mock.calls).toEqual([["transport error: connect ECONNREFUSED 127.0.0.1:9"], ["invalid input: no data to send"]]);
		expect(alert.mock.calls).toEqual([
			["Transaction error", "connect ECONNREFUSED 127.0.0.1:9"],
			["Invalid input", "no data to send"],
		]);
		expect(reporter.name).toBe("alert");
	});
});

describe("ConsoleReporter", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should write failures to stderr", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		new ConsoleReporter().report(new ConnectTimeoutError(50));

		expect(error).toHaveBeenCalledWith("connect timeout: connection not established within 50ms");
	});

	it("should log successful transactions only when verbose", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const summary = {
			endpoint: { address: "127.0.0.1", port: 7000 },
			success: true,
			bytesSent: 4,
			bytesReceived: 4,
			duration: 3,
		};

		new ConsoleReporter().onComplete(summary);
		expect(log).not.toHaveBeenCalled();

		new ConsoleReporter({ verbose: true }).onComplete(summary);
		expect(log).toHaveBeenCalledWith("127.0.0.1:7000 sent 4 bytes, received 4 bytes (3ms)");
	});
});

describe("SilentReporter", () => {
	it("should collect errors and summaries", () => {
		const reporter = new SilentReporter();
		const error = new ReceiveTimeoutError(1);

		reporter.report(error);
		reporter.onComplete({
			endpoint: { address: "127.0.0.1", port: 1 },
			success: false,
			bytesSent: 0,
			bytesReceived: 0,
			duration: 1,
			error,
		});

		expect(reporter.getErrors()).toEqual([error]);
		expect(reporter.getLastError()).toBe(error);
		expect(reporter.getSummaries()).toHaveLength(1);
	});
});

describe("createReporter", () => {
	it("should pick the alert reporter only when alerts are enabled and available", () => {
		const log = vi.fn();
		const alert = vi.fn();

		expect(createReporter({ log, alert, showAlerts: true })).toBeInstanceOf(AlertReporter);
		expect(createReporter({ log, alert, showAlerts: false })).toBeInstanceOf(LogReporter);
		expect(createReporter({ log, alert, showAlerts: false })).not.toBeInstanceOf(AlertReporter);
		expect(createReporter({ log, showAlerts: true })).not.toBeInstanceOf(AlertReporter);
	});

	it("should fall back to the console without a log callback", () => {
		expect(createReporter()).toBeInstanceOf(ConsoleReporter);
	});
});
