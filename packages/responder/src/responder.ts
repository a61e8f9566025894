import net from 'node:net'
import type { IResponderSocket, ResponderAddress, ResponderConfig } from './types'
import { ResponderSocket } from './responder.socket'

type SocketHandler = (socket: IResponderSocket) => void
type DataHandler = (socket: IResponderSocket, chunk: Buffer) => void
type ResponderErrorHandler = (err: Error, socket?: IResponderSocket) => void

type ResponderHandlerType = 'connection' | 'data' | 'error' | 'disconnect'

type ResponderEventHandlers<T extends ResponderHandlerType> = T extends 'connection' ? SocketHandler :
  T extends 'data' ? DataHandler :
  T extends 'error' ? ResponderErrorHandler :
  T extends 'disconnect' ? SocketHandler : never

/**
 * Loopback TCP peer for exercising transaction clients.
 * Answers every connection according to its mode (see `ResponderMode`).
 */
export class Responder {
  private server: net.Server | null = null
  private config: Required<ResponderConfig>
  private _sockets: Map<string, IResponderSocket> = new Map()
  private _address: ResponderAddress | null = null
  private _connectionCount = 0
  private listening = false

  private onConnection?: SocketHandler
  private onData?: DataHandler
  private onError?: ResponderErrorHandler
  private onDisconnect?: SocketHandler

  constructor(cfg: ResponderConfig = {}) {
    this.config = {
      mode: cfg.mode ?? 'echo',
      reply: cfg.reply ?? new Uint8Array(0),
      delayMs: cfg.delayMs ?? 0,
    }
  }

  /**
   * Sockets still open on the responder side
   */
  get openSockets(): number {
    return this._sockets.size
  }

  /**
   * Connections accepted since `listen()`
   */
  get connectionCount(): number {
    return this._connectionCount
  }

  get address(): ResponderAddress | null {
    return this._address
  }

  on<T extends ResponderHandlerType>(event: T, handler: ResponderEventHandlers<T>): void {
    switch (event) {
      case 'connection': this.onConnection = handler as SocketHandler; break
      case 'data': this.onData = handler as DataHandler; break
      case 'error': this.onError = handler as ResponderErrorHandler; break
      case 'disconnect': this.onDisconnect = handler as SocketHandler; break
    }
  }

  /**
   * Start listening. Port 0 picks a free port; the bound address is returned.
   */
  listen(host = '127.0.0.1', port = 0): Promise<ResponderAddress> {
    if (this.listening) throw new Error('responder is already listening')

    const connectionHandler = (socket: net.Socket) => {
      const responderSocket = new ResponderSocket(socket, this.config, {
        onData: (sock, chunk) => this.onData?.(sock, chunk),
        onClose: (sock) => {
          this._sockets.delete(sock.id)
          this.onDisconnect?.(sock)
        },
        onError: (err, sock) => this.onError?.(err, sock),
      })
      this._connectionCount++
      this._sockets.set(responderSocket.id, responderSocket)
      this.onConnection?.(responderSocket)
    }

    return new Promise((resolve, reject) => {
      const server = net.createServer(connectionHandler)
      this.server = server

      server.on('error', (err: Error) => {
        if (!this.listening) {
          reject(err)
        } else {
          this.onError?.(err)
        }
      })

      server.listen(port, host, () => {
        this.listening = true
        const bound = server.address()
        this._address = typeof bound === 'object' && bound !== null
          ? { host: bound.address, port: bound.port }
          : { host, port }
        resolve(this._address)
      })
    })
  }

  /**
   * Resolves once the responder side of every connection has closed
   */
  async drained(timeoutMs = 1000): Promise<boolean> {
    const deadline = Date.now() + timeoutMs
    while (this._sockets.size > 0) {
      if (Date.now() >= deadline) return false
      await new Promise((resolve) => setTimeout(resolve, 5))
    }
    return true
  }

  async close(): Promise<void> {
    const server = this.server
    if (!server) return

    for (const socket of this._sockets.values()) {
      socket.close()
    }
    this._sockets.clear()

    return new Promise((resolve) => {
      server.close(() => {
        this.listening = false
        this.server = null
        this._address = null
        resolve()
      })
    })
  }
}
