import net from 'node:net'
import { getSocketPath } from './protocol.js'
import type { DaemonRequest, DaemonResponse, DaemonStatus, WireEntry, WireHistoryPage } from './protocol.js'
import type { PatchSignal, TurnResult } from '../memory/types.js'
import { createLogger } from '../logger.js'

// Omit applied per member so the union stays discriminated
type WithoutRequestId<T> = T extends unknown ? Omit<T, 'requestId'> : never
type OutgoingRequest = WithoutRequestId<DaemonRequest>

/** Raised when the daemon answers a request with an error response. */
export class DaemonRequestError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message)
    this.name = 'DaemonRequestError'
  }
}

const log = createLogger('client')

export class DaemonClient {
  private socket: net.Socket | null = null
  private buffer: string = ''
  private handlers: Map<string, (response: DaemonResponse) => void> = new Map()
  private nextRequestId: number = 1

  private generateRequestId(): string {
    return String(this.nextRequestId++)
  }

  async connect(socketPath: string = getSocketPath()): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket = net.connect(socketPath, () => {
        resolve()
      })

      this.socket.on('data', (data) => {
        this.buffer += data.toString()
        const lines = this.buffer.split('\n')
        this.buffer = lines.pop() ?? ''

        for (const line of lines) {
          if (line.trim() === '') continue
          this.dispatch(line)
        }
      })

      this.socket.on('error', (err) => {
        reject(err)
      })
    })
  }

  async disconnect(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.socket) {
        resolve()
        return
      }
      this.socket.on('close', () => {
        this.socket = null
        resolve()
      })
      this.socket.end()
    })
  }

  async send(request: OutgoingRequest): Promise<DaemonResponse> {
    return new Promise((resolve, reject) => {
      if (!this.socket || this.socket.destroyed) {
        reject(new Error('Not connected'))
        return
      }

      const requestId = this.generateRequestId()

      this.handlers.set(requestId, (response: DaemonResponse) => {
        this.handlers.delete(requestId)
        resolve(response)
      })

      this.socket.write(JSON.stringify({ ...request, requestId }) + '\n')
    })
  }

  async turn(userId: string, message: string, patch?: PatchSignal): Promise<TurnResult> {
    const response = expectOk(await this.send({ type: 'turn', userId, message, patch }))
    if (response.type === 'turn-result') {
      return response.data
    }
    throw new Error(`Unexpected response type: ${response.type}`)
  }

  async history(userId: string, page?: number, pageSize?: number): Promise<WireHistoryPage> {
    const response = expectOk(await this.send({ type: 'history', userId, page, pageSize }))
    if (response.type === 'ok' && isHistoryPage(response.data)) {
      return response.data
    }
    throw new Error(`Unexpected response type: ${response.type}`)
  }

  async memory(userId: string): Promise<WireEntry[]> {
    const response = expectOk(await this.send({ type: 'memory', userId }))
    if (response.type === 'ok' && Array.isArray(response.data)) {
      return response.data.filter(isWireEntry)
    }
    throw new Error(`Unexpected response type: ${response.type}`)
  }

  async status(): Promise<DaemonStatus> {
    const response = expectOk(await this.send({ type: 'status' }))
    if (response.type === 'status') {
      return response.data
    }
    throw new Error(`Unexpected response type: ${response.type}`)
  }

  async shutdown(): Promise<void> {
    const response = expectOk(await this.send({ type: 'shutdown' }))
    if (response.type !== 'ok') {
      throw new Error(`Unexpected response type: ${response.type}`)
    }
  }

  private dispatch(line: string): void {
    let response: DaemonResponse
    try {
      response = JSON.parse(line)
    } catch {
      log.warn(`Ignoring malformed response from daemon: ${line.slice(0, 80)}`)
      return
    }
    const id = response.requestId
    const handler = id ? this.handlers.get(id) : undefined
    if (handler) {
      handler(response)
    } else {
      log.debug(`Dropping response with no pending request: ${line.slice(0, 80)}`)
    }
  }
}

function expectOk(response: DaemonResponse): Exclude<DaemonResponse, { type: 'error' }> {
  if (response.type === 'error') {
    throw new DaemonRequestError(response.code, response.message)
  }
  return response
}

function isHistoryPage(value: unknown): value is WireHistoryPage {
  return typeof value === 'object' && value !== null && 'turns' in value && Array.isArray(value.turns)
}

function isWireEntry(value: unknown): value is WireEntry {
  return typeof value === 'object' && value !== null && 'factText' in value && typeof value.factText === 'string'
}
