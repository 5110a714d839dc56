import * as readline from 'node:readline'
import { DaemonClient, DaemonRequestError } from '../daemon/client.js'
import { formatContextStats, formatEntry, formatHistoryTurn, formatUptime } from './format.js'

// ANSI color codes
const RESET = '\x1b[0m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'
const CYAN = '\x1b[36m'
const GREEN = '\x1b[32m'
const YELLOW = '\x1b[33m'
const MAGENTA = '\x1b[35m'

const HELP_TEXT = `
${BOLD}Commands:${RESET}
  ${CYAN}/status${RESET}          Show daemon status
  ${CYAN}/memory${RESET}          List the key facts remembered about you
  ${CYAN}/history [page]${RESET}  Show past turns, newest first
  ${CYAN}/patch <text>${RESET}    Regenerate the last reply using <text> as the enriched prompt
  ${CYAN}/help${RESET}            Show this help
`

// Spinner frames for thinking indicator
const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

class Spinner {
  private frameIndex = 0
  private interval: NodeJS.Timeout | null = null
  private message: string

  constructor(message: string = 'thinking') {
    this.message = message
  }

  start(): void {
    this.frameIndex = 0
    process.stdout.write('\n')
    this.render()
    this.interval = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length
      this.render()
    }, 80)
  }

  private render(): void {
    const frame = SPINNER_FRAMES[this.frameIndex]
    process.stdout.write(`\r${DIM}${frame} ${this.message}...${RESET}\x1b[K`)
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
    // Clear the spinner line
    process.stdout.write('\r\x1b[K')
  }
}

function describeFailure(e: unknown): string {
  if (e instanceof DaemonRequestError) return `${e.message} (${e.code})`
  return e instanceof Error ? e.message : 'Unknown error'
}

export async function startChat(userId: string): Promise<void> {
  const client = new DaemonClient()

  try {
    await client.connect()
  } catch {
    console.log(`${YELLOW}Could not connect to daemon. Run "recollect wake" first.${RESET}`)
    process.exit(1)
  }

  console.log(`${GREEN}Connected as ${userId}.${RESET} Type your message and press Enter. ${DIM}Ctrl+C to exit.${RESET}`)
  console.log(`${DIM}Type /help for commands.${RESET}\n`)

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: `${CYAN}>${RESET} `
  })

  const sendTurn = async (message: string, enrichedPrompt?: string): Promise<void> => {
    const spinner = new Spinner(enrichedPrompt ? 'regenerating' : 'thinking')
    spinner.start()
    try {
      const result = await client.turn(userId, message, enrichedPrompt ? { enrichedPrompt } : undefined)
      spinner.stop()
      process.stdout.write(`\n${MAGENTA}Assistant:${RESET} ${result.replyText}`)
      if (result.skills.length > 0) {
        process.stdout.write(`\n${DIM}skills: ${result.skills.map(s => s.action ? `${s.name}.${s.action}` : s.name).join(', ')}${RESET}`)
      }
      if (result.continueListening) {
        process.stdout.write(`\n${DIM}(listening)${RESET}`)
      }
    } catch (e) {
      spinner.stop()
      console.error(`\n${YELLOW}Error: ${describeFailure(e)}${RESET}`)
    }
    process.stdout.write('\n\n')
  }

  let lastMessage: string | null = null

  const handleLine = async (line: string): Promise<void> => {
    const message = line.trim()
    if (!message) return

    if (!message.startsWith('/')) {
      lastMessage = message
      await sendTurn(message)
      return
    }

    const [command = '', ...rest] = message.slice(1).split(/\s+/)
    const args = rest.join(' ')

    switch (command.toLowerCase()) {
      case 'help':
        console.log(HELP_TEXT)
        break

      case 'status':
        try {
          const status = await client.status()
          console.log('')
          console.log(`  ${DIM}Uptime:${RESET}          ${formatUptime(status.uptime)}`)
          console.log(`  ${DIM}Model:${RESET}           ${status.model}`)
          console.log(`  ${DIM}Turns in flight:${RESET} ${status.inFlightTurns}`)
          console.log(`  ${DIM}Last context:${RESET}    ${formatContextStats(status.lastContext)}`)
          console.log('')
        } catch (e) {
          console.error(`${YELLOW}Failed to get status:${RESET}`, describeFailure(e))
        }
        break

      case 'memory':
        try {
          const entries = await client.memory(userId)
          if (entries.length === 0) {
            console.log(`\n${DIM}Nothing remembered yet.${RESET}\n`)
          } else {
            console.log('')
            entries.forEach((entry, i) => console.log(formatEntry(i + 1, entry)))
            console.log('')
          }
        } catch (e) {
          console.error(`${YELLOW}Failed to list memory:${RESET}`, describeFailure(e))
        }
        break

      case 'history':
        try {
          const page = await client.history(userId, args ? parseInt(args, 10) || 1 : 1, 5)
          console.log(`\n  ${DIM}Page ${page.page} of ${Math.max(page.totalPages, 1)} (${page.totalCount} turns)${RESET}\n`)
          for (const turn of page.turns) {
            console.log(formatHistoryTurn(turn))
            console.log('')
          }
        } catch (e) {
          console.error(`${YELLOW}Failed to load history:${RESET}`, describeFailure(e))
        }
        break

      case 'patch':
        if (!args) {
          console.log(`${DIM}Usage: /patch <enriched prompt>${RESET}`)
          break
        }
        await sendTurn(lastMessage ?? args, args)
        break

      default:
        console.log(`${YELLOW}Unknown command: /${command}${RESET}`)
        console.log(`${DIM}Type /help for available commands.${RESET}`)
    }
  }

  rl.prompt()

  rl.on('line', (line: string) => {
    handleLine(line)
      .catch((e: unknown) => console.error(`${YELLOW}Error: ${describeFailure(e)}${RESET}`))
      .finally(() => rl.prompt())
  })

  rl.on('close', () => {
    console.log(`\n${DIM}Goodbye.${RESET}`)
    client.disconnect()
      .catch((e: unknown) => console.error(describeFailure(e)))
      .finally(() => process.exit(0))
  })
}
