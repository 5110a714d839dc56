#!/usr/bin/env node

import { Command } from 'commander'
import {
  wakeCommand,
  sleepCommand,
  statusCommand,
  defaultCommand,
  memoryCommand,
  historyCommand,
  configCommand
} from './cli/commands.js'

const DEFAULT_USER = process.env.RECOLLECT_USER || process.env.USER || 'default'

const program = new Command()

program
  .name('recollect')
  .description('A daemon-based assistant that remembers prioritized key facts about each user')
  .version('1.0.0')
  // Subcommands declare their own --user
  .enablePositionalOptions()
  .option('-u, --user <id>', 'User id to chat as', DEFAULT_USER)
  .action(async (options: { user: string }) => {
    await defaultCommand(options)
  })

program
  .command('wake')
  .description('Start the daemon as a detached background process')
  .option('--foreground', 'Run the daemon in this process')
  .action(async (options: { foreground?: boolean }) => {
    await wakeCommand(options)
  })

program
  .command('sleep')
  .description('Send shutdown signal to daemon')
  .action(async () => {
    await sleepCommand()
  })

program
  .command('status')
  .description('Query daemon for status')
  .action(async () => {
    await statusCommand()
  })

program
  .command('memory')
  .description('List the key facts remembered for a user')
  .option('-u, --user <id>', 'User id', DEFAULT_USER)
  .action(async (options: { user: string }) => {
    await memoryCommand(options)
  })

program
  .command('history')
  .description('Show a user\'s conversation history, newest first')
  .option('-u, --user <id>', 'User id', DEFAULT_USER)
  .option('-p, --page <n>', 'Page number', '1')
  .option('-s, --size <n>', 'Turns per page', '10')
  .action(async (options: { user: string; page: string; size: string }) => {
    await historyCommand(options)
  })

program
  .command('config')
  .description('Print the config, or set a value with dot notation')
  .argument('[action]', '"set" to change a value')
  .argument('[key]', 'e.g. context.maxTotalChars')
  .argument('[value]', 'JSON or plain string')
  .action(async (action?: string, key?: string, value?: string) => {
    await configCommand(action, key, value)
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
