import { fork } from 'node:child_process'
import { fileURLToPath } from 'node:url'
import { existsSync, readFileSync, unlinkSync } from 'node:fs'
import path from 'node:path'
import { DaemonClient } from '../daemon/client.js'
import { loadConfig, saveConfig, validateConfig } from '../config.js'
import type { ConfigProblem, RecollectConfig } from '../config.js'
import { ConfigError } from '../errors.js'
import { startChat } from './chat.js'
import { getPidPath } from '../daemon/protocol.js'
import { formatContextStats, formatEntry, formatHistoryTurn, formatUptime } from './format.js'

const NOT_RUNNING = 'Daemon is not running. Run \'recollect wake\' first.'

/**
 * Builds the nested object `config set` writes, parsing the value as JSON
 * when it can (numbers, booleans, arrays) and keeping it as a string otherwise.
 */
export function configPatch(key: string, value: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch {
    parsed = value
  }
  const parts = key.split('.')
  const leaf = parts.pop() ?? key
  const root: Record<string, unknown> = {}
  let current = root
  for (const part of parts) {
    const next: Record<string, unknown> = {}
    current[part] = next
    current = next
  }
  current[leaf] = parsed
  return root
}

function startupProblems(): ConfigProblem[] {
  try {
    return validateConfig(loadConfig())
  } catch (e) {
    if (e instanceof ConfigError) return e.problems
    throw e
  }
}

function isDaemonRunning(pidFile: string): boolean {
  if (!existsSync(pidFile)) {
    return false
  }
  const pid = parseInt(readFileSync(pidFile, 'utf-8').trim(), 10)
  try {
    // Sending signal 0 checks if the process exists without actually signaling it
    process.kill(pid, 0)
    return true
  } catch {
    // Process doesn't exist, clean up stale PID file
    unlinkSync(pidFile)
    return false
  }
}

export async function wakeCommand(options: { foreground?: boolean }): Promise<void> {
  if (isDaemonRunning(getPidPath())) {
    console.log('Daemon is already running.')
    return
  }

  // Validate config before starting so errors are visible to the user
  const problems = startupProblems()
  if (problems.length > 0) {
    console.error('Cannot start daemon, configuration problems:\n')
    for (const problem of problems) {
      console.error(`  ${problem.field}: ${problem.message}\n`)
    }
    process.exit(1)
  }

  if (options.foreground) {
    console.log(`Daemon starting in foreground (PID: ${process.pid})\n`)
    // Run the daemon entry directly in this process
    await import('../daemon/entry.js')
    return
  }

  const __filename = fileURLToPath(import.meta.url)
  const __dirname = path.dirname(__filename)
  // Running from sources needs tsx to load the entry; the built CLI forks plain JS
  const fromSource = __filename.endsWith('.ts')
  const daemonEntry = path.resolve(__dirname, fromSource ? '../daemon/entry.ts' : '../daemon/entry.js')

  const child = fork(daemonEntry, [], {
    detached: true,
    stdio: 'ignore',
    execArgv: fromSource ? ['--import', 'tsx'] : []
  })

  child.unref()

  console.log(`Daemon waking up (PID: ${child.pid})`)
}

export async function sleepCommand(): Promise<void> {
  const client = new DaemonClient()
  try {
    await client.connect()
    await client.shutdown()
    await client.disconnect()
    console.log('Daemon is going to sleep...')
  } catch {
    // Daemon unreachable, clean up stale PID file if present
    const pidFile = getPidPath()
    if (existsSync(pidFile)) {
      unlinkSync(pidFile)
    }
    console.log('Daemon is not running.')
  }
}

export async function statusCommand(): Promise<void> {
  const client = new DaemonClient()
  try {
    await client.connect()
    const status = await client.status()
    await client.disconnect()

    console.log('')
    console.log('  Recollect Daemon Status')
    console.log('  -----------------------')
    console.log(`  Uptime:           ${formatUptime(status.uptime)}`)
    console.log(`  Model:            ${status.model}`)
    console.log(`  Turns in flight:  ${status.inFlightTurns}`)
    console.log(`  Last context:     ${formatContextStats(status.lastContext)}`)
    console.log('')
  } catch {
    console.log(NOT_RUNNING)
  }
}

export async function defaultCommand(options: { user: string }): Promise<void> {
  await startChat(options.user)
}

export async function memoryCommand(options: { user: string }): Promise<void> {
  const client = new DaemonClient()
  try {
    await client.connect()
  } catch {
    console.log(NOT_RUNNING)
    return
  }

  try {
    const entries = await client.memory(options.user)
    if (entries.length === 0) {
      console.log(`No key facts remembered for ${options.user}.`)
      return
    }
    console.log(`\n  Key facts for ${options.user} (${entries.length}):\n`)
    entries.forEach((entry, i) => console.log(formatEntry(i + 1, entry)))
    console.log('')
  } catch (e) {
    console.log(`Error: ${e instanceof Error ? e.message : String(e)}`)
  } finally {
    await client.disconnect()
  }
}

export async function historyCommand(options: { user: string; page: string; size: string }): Promise<void> {
  const client = new DaemonClient()
  try {
    await client.connect()
  } catch {
    console.log(NOT_RUNNING)
    return
  }

  try {
    const page = await client.history(options.user, parseInt(options.page, 10), parseInt(options.size, 10))
    if (page.totalCount === 0) {
      console.log(`No conversation history for ${options.user}.`)
      return
    }
    console.log(`\n  Page ${page.page} of ${page.totalPages} (${page.totalCount} turns, newest first)\n`)
    for (const turn of page.turns) {
      console.log(formatHistoryTurn(turn))
      console.log('')
    }
  } catch (e) {
    console.log(`Error: ${e instanceof Error ? e.message : String(e)}`)
  } finally {
    await client.disconnect()
  }
}

export async function configCommand(action?: string, key?: string, value?: string): Promise<void> {
  if (!action) {
    // Print current config, without the secret
    let config: RecollectConfig
    try {
      config = loadConfig()
    } catch (e) {
      if (!(e instanceof ConfigError)) throw e
      console.error(e.message)
      console.error('\nFix the fields above with: recollect config set <key> <value>')
      process.exitCode = 1
      return
    }
    const shown = { ...config, llm: { ...config.llm, apiKey: config.llm.apiKey ? '(set)' : '(not set)' } }
    console.log(JSON.stringify(shown, null, 2))
    return
  }

  if (action === 'set' && key && value !== undefined) {
    saveConfig(configPatch(key, value))
    console.log(`Set ${key} = ${value}`)
    return
  }

  console.log('Usage: recollect config [set <key> <value>]')
}
