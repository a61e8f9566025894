/**
 * oneshot-tcp
 *
 * Bounded TCP request/response transactions: connect, send one payload,
 * read one reply, close, with a deadline on every phase.
 *
 * For an in-process peer to test against, install:
 * - @oneshot-tcp/responder - echo / fixed reply / silent loopback responder
 *
 * @example
 * ```typescript
 * import { TransactionClient, trimPadding } from 'oneshot-tcp';
 *
 * const client = new TransactionClient({
 *   receiveTimeoutMs: 2000,
 *   log: (line) => console.log(line),
 * });
 *
 * const reply = Buffer.alloc(1024);
 * const ok = await client.execute('127.0.0.1', 50000, Buffer.from('PING'), reply);
 * if (ok) console.log(trimPadding(reply).toString('ascii'));
 * ```
 */

// Configuration (TransactionClientConfig, defaults, environment loading)
export * from "./config";
// Reporters (LogReporter, AlertReporter, ConsoleReporter, SilentReporter)
export * from "./reporting";
// Text helpers (TextExchange, trimPadding, ASCII codecs)
export * from "./text";
// Transaction (TransactionClient, errors, phase signals, endpoint validation)
export * from "./transaction";
