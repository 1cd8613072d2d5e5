import type { IncomingMessage } from 'node:http'
import WebSocket, { WebSocketServer, type VerifyClientCallbackAsync } from 'ws'

export type Connection = { socket: WebSocket; request: IncomingMessage; received: string[] }

/** Pulsar WebSocket endpoint stand-in on a random local port. */
export class FakePulsar {
  readonly connections: Connection[] = []

  private constructor(
    private readonly server: WebSocketServer,
    readonly port: number,
  ) {
    server.on('connection', (socket, request) => {
      const connection: Connection = { socket, request, received: [] }
      socket.on('message', (data) => connection.received.push(data.toString()))
      this.connections.push(connection)
    })
  }

  static start(verifyClient?: VerifyClientCallbackAsync): Promise<FakePulsar> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: '127.0.0.1', port: 0, verifyClient })
      server.once('error', reject)
      server.once('listening', () => {
        const address = server.address()
        if (typeof address === 'string') {
          reject(new Error(`unexpected address ${address}`))
          return
        }
        resolve(new FakePulsar(server, address.port))
      })
    })
  }

  get url(): string {
    return `ws://127.0.0.1:${this.port}`
  }

  send(frame: unknown, connection = this.connections[this.connections.length - 1]): void {
    connection.socket.send(typeof frame === 'string' ? frame : JSON.stringify(frame))
  }

  stop(): Promise<void> {
    for (const client of this.server.clients) client.terminate()
    return new Promise((resolve) => this.server.close(() => resolve()))
  }
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('condition not met in time')
    await new Promise((resolve) => setTimeout(resolve, 5))
  }
}
