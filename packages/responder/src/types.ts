/**
 * Responder Types
 */

/**
 * How the responder answers each connection:
 * - "echo": write every received chunk back
 * - "reply": answer the first chunk with a fixed payload
 * - "silent": accept and read, never answer
 * - "close": end the connection after the first chunk without answering
 */
export type ResponderMode = 'echo' | 'reply' | 'silent' | 'close'

export interface ResponderConfig {
  mode?: ResponderMode;
  reply?: Uint8Array; // Payload for "reply" mode
  delayMs?: number; // Delay before answering / closing
}

export interface ResponderAddress {
  host: string;
  port: number;
}

export interface IResponderSocket {
  readonly id: string
  readonly remoteAddress: string
  readonly remotePort: number
  readonly connected: boolean
  readonly received: Buffer
  close(): void
}
