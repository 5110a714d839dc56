import net from 'node:net'
import { unlinkSync, existsSync } from 'node:fs'
import { getSocketPath, daemonRequestSchema, toWireEntry, toWireTurn } from './protocol.js'
import type { DaemonRequest, DaemonResponse, DaemonStatus, ErrorCode, WireHistoryPage } from './protocol.js'
import { ModelError, StorageError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { RequestOrchestrator } from './orchestrator.js'

const MAX_BUFFER_SIZE = 1024 * 1024 // 1MB

const MODEL_FAILURE_MESSAGE = 'The assistant could not answer right now. Please try again.'

const log = createLogger('daemon')

export class DaemonServer {
  private server: net.Server | null = null
  private connections: Set<net.Socket> = new Set()
  private startTime: number = 0
  private orchestrator: RequestOrchestrator | null = null
  private model: string = ''
  private onShutdown: (() => Promise<void>) | null = null

  init(params: {
    orchestrator: RequestOrchestrator
    model: string
    onShutdown?: () => Promise<void>
  }): void {
    this.orchestrator = params.orchestrator
    this.model = params.model
    this.onShutdown = params.onShutdown ?? null
  }

  async start(socketPath: string = getSocketPath()): Promise<void> {
    if (existsSync(socketPath)) {
      unlinkSync(socketPath)
    }

    this.startTime = Date.now()

    return new Promise((resolve, reject) => {
      this.server = net.createServer((socket) => {
        this.connections.add(socket)
        // Closing the socket abandons this connection's in-flight turns
        const connection = new AbortController()
        let buffer = ''

        socket.on('data', (data) => {
          buffer += data.toString()

          if (buffer.length > MAX_BUFFER_SIZE) {
            this.sendResponse(socket, { type: 'error', code: 'invalid', message: 'Message too large' })
            buffer = ''
            return
          }

          const lines = buffer.split('\n')
          // Keep the last (possibly incomplete) chunk in the buffer
          buffer = lines.pop() ?? ''

          for (const line of lines) {
            if (line.trim() === '') continue
            this.handleLine(line, socket, connection.signal)
          }
        })

        socket.on('close', () => {
          connection.abort()
          this.connections.delete(socket)
        })

        socket.on('error', (err) => {
          log.debug(`Connection error: ${err.message}`)
          this.connections.delete(socket)
        })
      })

      this.server.on('error', reject)

      this.server.listen(socketPath, () => {
        log.info(`Listening on ${socketPath}`)
        resolve()
      })
    })
  }

  async stop(): Promise<void> {
    // Close all active connections
    for (const socket of this.connections) {
      socket.destroy()
    }
    this.connections.clear()

    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve()
        return
      }
      this.server.close((err) => {
        if (err) {
          reject(err)
        } else {
          this.server = null
          resolve()
        }
      })
    })
  }

  private handleLine(line: string, socket: net.Socket, signal: AbortSignal): void {
    let parsed: unknown
    try {
      parsed = JSON.parse(line)
    } catch {
      this.sendResponse(socket, { type: 'error', code: 'invalid', message: 'Invalid JSON' })
      return
    }

    const result = daemonRequestSchema.safeParse(parsed)
    if (!result.success) {
      const issue = result.error.issues[0]
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
      this.sendResponse(socket, {
        type: 'error',
        code: 'invalid',
        message: `Invalid request: ${where}${issue?.message ?? 'unrecognized shape'}`
      }, requestIdOf(parsed))
      return
    }

    this.handleRequest(result.data, socket, signal).catch((e: unknown) => {
      this.sendError(socket, e, result.data.requestId)
    })
  }

  private async handleRequest(request: DaemonRequest, socket: net.Socket, signal: AbortSignal): Promise<void> {
    const requestId = request.requestId

    switch (request.type) {
      case 'status':
        this.handleStatus(socket, requestId)
        break
      case 'shutdown':
        this.handleShutdown(socket, requestId)
        break
      case 'turn': {
        const orchestrator = this.requireOrchestrator()
        const data = await orchestrator.handleTurn(request.userId, request.message, {
          patch: request.patch,
          abortSignal: signal
        })
        this.sendResponse(socket, { type: 'turn-result', data }, requestId)
        break
      }
      case 'history': {
        const orchestrator = this.requireOrchestrator()
        const page = await orchestrator.history(request.userId, request.page, request.pageSize)
        const data: WireHistoryPage = { ...page, turns: page.turns.map(toWireTurn) }
        this.sendResponse(socket, { type: 'ok', data }, requestId)
        break
      }
      case 'memory': {
        const orchestrator = this.requireOrchestrator()
        const entries = await orchestrator.memory(request.userId)
        this.sendResponse(socket, { type: 'ok', data: entries.map(toWireEntry) }, requestId)
        break
      }
    }
  }

  private requireOrchestrator(): RequestOrchestrator {
    if (!this.orchestrator) {
      throw new Error('Daemon not initialized. Memory subsystem unavailable.')
    }
    return this.orchestrator
  }

  private handleStatus(socket: net.Socket, requestId?: string): void {
    const status: DaemonStatus = {
      uptime: Date.now() - this.startTime,
      inFlightTurns: this.orchestrator?.inFlightTurns ?? 0,
      model: this.model,
      lastContext: this.orchestrator?.lastContextStats ?? null
    }
    this.sendResponse(socket, { type: 'status', data: status }, requestId)
  }

  private handleShutdown(socket: net.Socket, requestId?: string): void {
    this.sendResponse(socket, { type: 'ok' }, requestId)
    // Defer stop so the response can be sent
    setImmediate(() => {
      this.shutdown().catch((e: unknown) => {
        log.error('Shutdown failed:', e)
      })
    })
  }

  private async shutdown(): Promise<void> {
    await this.stop()
    if (this.onShutdown) {
      await this.onShutdown()
    }
  }

  private sendError(socket: net.Socket, e: unknown, requestId?: string): void {
    const { code, message } = describeError(e)
    if (code === 'internal') {
      log.error('Request failed:', e)
    } else {
      log.warn(`Request failed (${code}): ${e instanceof Error ? e.message : String(e)}`)
    }
    this.sendResponse(socket, { type: 'error', code, message }, requestId)
  }

  private sendResponse(socket: net.Socket, response: DaemonResponse, requestId?: string): void {
    if (!socket.destroyed) {
      const payload = requestId ? { ...response, requestId } : response
      socket.write(JSON.stringify(payload) + '\n')
    }
  }
}

export function describeError(e: unknown): { code: ErrorCode; message: string } {
  if (e instanceof StorageError) return { code: 'storage', message: e.message }
  if (e instanceof ModelError) return { code: 'model', message: MODEL_FAILURE_MESSAGE }
  return { code: 'internal', message: e instanceof Error ? e.message : 'Unknown error' }
}

function requestIdOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'requestId' in value && typeof value.requestId === 'string') {
    return value.requestId
  }
  return undefined
}
