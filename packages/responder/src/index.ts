/**
 * Loopback responder for oneshot-tcp
 *
 * In-process TCP peer that echoes, answers with a fixed payload, stays silent
 * or hangs up, so transaction clients can be exercised without a real server.
 *
 * @example
 * ```typescript
 * import { Responder } from '@oneshot-tcp/responder';
 *
 * const responder = new Responder({ mode: 'echo' });
 * const { host, port } = await responder.listen();
 * ```
 */

export * from "./responder";
export * from "./responder.socket";
export type { IResponderSocket, ResponderAddress, ResponderConfig, ResponderMode } from "./types";
