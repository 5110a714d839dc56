import type { ConfigProblem } from './config.js'

export class RecollectError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RecollectError'
  }
}

/** A durable read or write failed. Fatal to the turn that hit it. */
export class StorageError extends RecollectError {
  constructor(
    public readonly operation: string,
    public readonly cause: unknown
  ) {
    super(`Storage operation failed: ${operation}${cause instanceof Error ? ` (${cause.message})` : ''}`)
    this.name = 'StorageError'
  }
}

/** The model endpoint failed, timed out, or the caller went away. Fatal to the turn. */
export class ModelError extends RecollectError {
  constructor(
    message: string,
    public readonly cause: unknown = null
  ) {
    super(message)
    this.name = 'ModelError'
  }
}

/** Raised while parsing a structured reply; the gateway swaps in the fallback reply. */
export class MalformedModelReply extends RecollectError {
  constructor(public readonly reason: string) {
    super(`Malformed model reply: ${reason}`)
    this.name = 'MalformedModelReply'
  }
}

/** The config file or environment describes a daemon that cannot start. */
export class ConfigError extends RecollectError {
  constructor(
    message: string,
    public readonly problems: ConfigProblem[] = []
  ) {
    super(`Configuration error: ${message}`)
    this.name = 'ConfigError'
  }
}
