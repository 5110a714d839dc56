import { DaemonServer } from './server.js'
import { DaemonLifecycle } from './lifecycle.js'
import { writeFileSync, unlinkSync, existsSync } from 'node:fs'
import { getPidPath } from './protocol.js'
import { createLogger } from '../logger.js'

const PID_FILE = getPidPath()
const log = createLogger('daemon')

function cleanupPidFile(): void {
  try {
    if (existsSync(PID_FILE)) unlinkSync(PID_FILE)
  } catch (e) {
    log.warn(`Could not remove PID file ${PID_FILE}: ${e instanceof Error ? e.message : String(e)}`)
  }
}

process.on('uncaughtException', (err) => {
  log.error('Daemon uncaught exception:', err)
  cleanupPidFile()
  process.exit(1)
})

process.on('unhandledRejection', (err) => {
  log.error('Daemon unhandled rejection:', err)
  cleanupPidFile()
  process.exit(1)
})

async function main(): Promise<void> {
  const lifecycle = new DaemonLifecycle()
  await lifecycle.wake()

  const server = new DaemonServer()

  const shutdown = async () => {
    await server.stop()
    await lifecycle.sleep()
    cleanupPidFile()
    process.exit(0)
  }

  server.init({
    orchestrator: lifecycle.orchestrator,
    model: `${lifecycle.config.llm.provider}/${lifecycle.config.llm.model}`,
    onShutdown: shutdown
  })

  await server.start()

  writeFileSync(PID_FILE, process.pid.toString())

  process.on('SIGTERM', () => {
    shutdown().catch(() => { cleanupPidFile(); process.exit(1) })
  })

  process.on('SIGINT', () => {
    shutdown().catch(() => { cleanupPidFile(); process.exit(1) })
  })

  process.on('exit', cleanupPidFile)
}

main().catch((err) => {
  log.error('Daemon failed to start:', err)
  process.exit(1)
})
