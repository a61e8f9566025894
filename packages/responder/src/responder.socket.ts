import type net from 'node:net'
import crypto from 'node:crypto'
import type { IResponderSocket, ResponderConfig, ResponderMode } from './types'

export class ResponderSocket implements IResponderSocket {
  readonly id: string
  private socket: net.Socket
  private mode: ResponderMode
  private reply: Uint8Array
  private delayMs: number
  private chunks: Buffer[] = []
  private timers = new Set<NodeJS.Timeout>()
  private answered = false
  private _connected = true

  constructor(
    socket: net.Socket,
    config: Required<ResponderConfig>,
    callbacks: {
      onData: (socket: IResponderSocket, chunk: Buffer) => void
      onClose: (socket: IResponderSocket) => void
      onError: (err: Error, socket: IResponderSocket) => void
    }
  ) {
    this.id = crypto.randomUUID()
    this.socket = socket
    this.mode = config.mode
    this.reply = config.reply
    this.delayMs = config.delayMs

    socket.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk)
      callbacks.onData(this, chunk)
      this.answer(chunk)
    })

    socket.on('close', () => {
      this._connected = false
      this.clearTimers()
      callbacks.onClose(this)
    })

    socket.on('error', (err: Error) => {
      callbacks.onError(err, this)
    })
  }

  get remoteAddress(): string {
    return this.socket.remoteAddress ?? ''
  }

  get remotePort(): number {
    return this.socket.remotePort ?? 0
  }

  get connected(): boolean {
    return this._connected
  }

  /**
   * Everything received on this connection so far
   */
  get received(): Buffer {
    return Buffer.concat(this.chunks)
  }

  close(): void {
    this._connected = false
    this.clearTimers()
    this.socket.destroy()
  }

  private answer(chunk: Buffer): void {
    switch (this.mode) {
      case 'echo':
        this.later(() => this.socket.write(chunk))
        break
      case 'reply':
        if (this.answered) return
        this.answered = true
        this.later(() => this.socket.write(this.reply))
        break
      case 'close':
        if (this.answered) return
        this.answered = true
        this.later(() => this.socket.end())
        break
      case 'silent':
        break
    }
  }

  private later(action: () => void): void {
    if (this.delayMs <= 0) {
      if (this._connected) action()
      return
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer)
      if (this._connected) action()
    }, this.delayMs)
    this.timers.add(timer)
  }

  private clearTimers(): void {
    for (const timer of this.timers) clearTimeout(timer)
    this.timers.clear()
  }
}
