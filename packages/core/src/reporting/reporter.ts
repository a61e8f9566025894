/**
 * Transaction Reporters
 *
 * Interface and implementations for reporting transaction failures.
 * Reporters are notification side effects only; they never change the
 * outcome of a transaction.
 */

import { formatEndpoint } from "../transaction/endpoint";
import type { TransactionError, TransactionErrorKind } from "../transaction/transaction.errors";
import type { TransactionSummary } from "../transaction/transaction.types";

/**
 * Logging callback receiving one human-readable line per failure
 */
export type LogCallback = (message: string) => void;

/**
 * Synchronous user alert (e.g. a modal dialog)
 */
export type AlertCallback = (title: string, message: string) => void;

/**
 * Transaction Reporter Interface
 */
export interface TransactionReporter {
	/** Reporter name */
	readonly name: string;

	/** Called once for every failed transaction, including input errors */
	report(error: TransactionError): void;

	/** Called when a transaction that reached the network finishes */
	onComplete?(summary: TransactionSummary): void;
}

const CATEGORIES: Record<TransactionErrorKind, string> = {
	"invalid-input": "invalid input",
	"connect-timeout": "connect timeout",
	"send-timeout": "send timeout",
	"receive-timeout": "receive timeout",
	transport: "transport error",
};

/**
 * Format a failure as `<category>: <message>`
 */
export function formatFailure(error: TransactionError): string {
	return `${CATEGORIES[error.kind]}: ${error.message}`;
}

export function alertTitle(error: TransactionError): string {
	return error.kind === "invalid-input" ? "Invalid input" : "Transaction error";
}

/**
 * Log Reporter
 *
 * Passes formatted failures to a logging callback.
 */
export class LogReporter implements TransactionReporter {
	readonly name: string = "log";
	protected readonly log: LogCallback;

	constructor(log: LogCallback) {
		this.log = log;
	}

	report(error: TransactionError): void {
		this.log(formatFailure(error));
	}
}

/**
 * Alert Reporter
 *
 * Logs like `LogReporter`, then raises a blocking alert.
 */
export class AlertReporter extends LogReporter {
	override readonly name = "alert";
	private readonly alert: AlertCallback;

	constructor(log: LogCallback, alert: AlertCallback) {
		super(log);
		this.alert = alert;
	}

	override report(error: TransactionError): void {
		super.report(error);
		this.alert(alertTitle(error), error.message);
	}
}

/**
 * Console Reporter
 *
 * Writes failures to stderr. With `verbose`, successful transactions are
 * logged as well.
 */
export class ConsoleReporter implements TransactionReporter {
	readonly name = "console";
	private verbose: boolean;

	constructor(options?: { verbose?: boolean }) {
		this.verbose = options?.verbose ?? false;
	}

	report(error: TransactionError): void {
		console.error(formatFailure(error));
	}

	onComplete(summary: TransactionSummary): void {
		if (!this.verbose || !summary.success) return;
		console.log(
			`${formatEndpoint(summary.endpoint)} sent ${summary.bytesSent} bytes, received ${summary.bytesReceived} bytes (${summary.duration}ms)`,
		);
	}
}

/**
 * Silent Reporter
 *
 * Does not output anything; keeps what it was given (useful for testing).
 */
export class SilentReporter implements TransactionReporter {
	readonly name = "silent";
	private errors: TransactionError[] = [];
	private summaries: TransactionSummary[] = [];

	report(error: TransactionError): void {
		this.errors.push(error);
	}

	onComplete(summary: TransactionSummary): void {
		this.summaries.push(summary);
	}

	getErrors(): TransactionError[] {
		return this.errors;
	}

	getSummaries(): TransactionSummary[] {
		return this.summaries;
	}

	getLastError(): TransactionError | undefined {
		return this.errors[this.errors.length - 1];
	}
}

/**
 * Reporter selection options
 */
export interface ReporterOptions {
	log?: LogCallback;
	alert?: AlertCallback;
	showAlerts?: boolean;
}

/**
 * Pick a reporter from configuration.
 * Alerts fire only when enabled and an alert sink is available.
 */
export function createReporter(options: ReporterOptions = {}): TransactionReporter {
	const { log, alert, showAlerts = false } = options;
	if (showAlerts && alert) {
		return new AlertReporter(log ?? ((message) => console.error(message)), alert);
	}
	return log ? new LogReporter(log) : new ConsoleReporter();
}
