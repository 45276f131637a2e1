/**
 * Commander program setup
 *
 * `play` replays a move file (or stdin) and prints one status per line;
 * `serve` starts the HTTP evaluation service.
 */

import { createRequire } from 'node:module'
import { readFile } from 'node:fs/promises'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { runPlay } from './commands/play.js'
import { loadConfig, parseTurnPolicy } from './config.js'
import type { TurnPolicy } from './engine/types.js'
import { EngineError } from './errors.js'
import { createLogger, type EventLogger } from './logger.js'
import { startServer } from './server.js'

const require = createRequire(import.meta.url)
const { version: cliVersion } = require('../package.json') as { version: string }

export interface CliIO {
  stdout: (text: string) => void
  stderr: (text: string) => void
  readStdin: () => Promise<string>
  env: NodeJS.ProcessEnv
  logger: EventLogger
}

interface PlayCommandOptions {
  size?: number
  players?: number
  turnPolicy?: TurnPolicy
  printBoard?: boolean
}

interface ServeCommandOptions {
  port?: number
  host?: string
}

function positiveInt(value: string): number {
  const parsed = parseInt(value, 10)
  if (!/^\d+$/.test(value) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function turnPolicyOption(value: string): TurnPolicy {
  try {
    return parseTurnPolicy(value, '--turn-policy')
  } catch {
    throw new InvalidArgumentError('Must be "every-attempt" or "valid-moves-only".')
  }
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf8')
}

export function defaultCliIO(): CliIO {
  return {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
    readStdin: readProcessStdin,
    env: process.env,
    logger: createLogger('cli'),
  }
}

export function createProgram(io: CliIO): Command {
  const program = new Command()

  // Set before adding commands so subcommands inherit them
  program
    .name('nxn-tictactoe')
    .description('Validate and score N-player tic-tac-toe move lists')
    .version(cliVersion)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })

  program
    .command('play')
    .description('Replay moves ("player row col" per line) and print a status per move')
    .argument('[file]', 'Move file (reads stdin when omitted)')
    .option('-s, --size <n>', 'Board size N for an NxN board', positiveInt)
    .option('-p, --players <n>', 'Number of players', positiveInt)
    .option('--turn-policy <policy>', 'every-attempt | valid-moves-only', turnPolicyOption)
    .option('--print-board', 'Print the final board after the statuses')
    .action(async (file: string | undefined, opts: PlayCommandOptions) => {
      const config = loadConfig(io.env)
      const input = file ? await readFile(file, 'utf8') : await io.readStdin()

      const report = runPlay(input, {
        boardSize: opts.size ?? config.boardSize,
        numPlayers: opts.players ?? config.numPlayers,
        turnPolicy: opts.turnPolicy ?? config.turnPolicy,
        printBoard: opts.printBoard === true,
        logger: io.logger,
      })
      io.stdout(report.output)
    })

  program
    .command('serve')
    .description('Start the HTTP evaluation service')
    .option('--port <port>', 'Port to listen on', positiveInt)
    .option('--host <host>', 'Host to bind')
    .action(async (opts: ServeCommandOptions) => {
      const config = loadConfig(io.env)
      await startServer({
        port: opts.port ?? config.port,
        host: opts.host ?? config.host,
        logLevel: config.logLevel,
      })
    })

  return program
}

// Runs the CLI on user arguments (no node/script prefix) and resolves to an exit code
export async function runCli(args: string[], io: CliIO = defaultCliIO()): Promise<number> {
  try {
    await createProgram(io).parseAsync(args, { from: 'user' })
    return 0
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode
    }
    if (err instanceof EngineError) {
      io.logger.error({ evt: 'cli.error', ...err.toJSON() }, err.message)
    } else {
      io.logger.error(err)
    }
    return 1
  }
}
