import { readFileSync } from 'fs'
import { Command } from 'commander'
import { PLUGIN_ID } from './constants'
import type { LogLevel } from './logger'

export type LogStream = 'stdout' | 'stderr'

export interface CliOptions {
  logLevel: LogLevel | null
  logFile: string | null
  logStream: LogStream | null
  entryFile: string | null
}

type RawOptions = {
  debug?: boolean
  warnings?: boolean
  quiet?: boolean
  logfile?: string
  stream?: string
  entry?: string
}

export const DEFAULT_LOG_FILE = `./${PLUGIN_ID}.log`

/**
 * 展开 @file 参数，文件中每行一个参数，支持嵌套
 */
export function expandArgFiles(
  argv: string[],
  readFile: (file: string) => string = (file) => readFileSync(file, 'utf8'),
  seen: Set<string> = new Set()
): string[] {
  return argv.flatMap((arg) => {
    if (!arg.startsWith('@') || arg.length === 1) {
      return [arg]
    }

    const file = arg.slice(1)
    if (seen.has(file)) {
      throw new Error(`Recursive argument file: ${file}`)
    }

    const lines = readFile(file)
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)

    return expandArgFiles(lines, readFile, new Set([...seen, file]))
  })
}

function createProgram(): Command {
  return new Command()
    .name('touchportal-websockets')
    .description('TouchPortal plugin that sends action messages over WebSocket')
    .option('-d, --debug', 'Use debug logging.')
    .option('-w, --warnings', 'Only log warnings and errors.')
    .option('-q, --quiet', 'Disable all logging (quiet).')
    .option(
      '-l, --logfile <logfile>',
      `Log file name (default is '${DEFAULT_LOG_FILE}'). Use 'none' to disable file logging.`
    )
    .option(
      '-s, --stream <stream>',
      "Log to output stream: 'stdout' (default), 'stderr', or 'none'."
    )
    .option('--entry <file>', 'Write the entry.tp file and exit.')
}

function resolveLogLevel(opts: RawOptions): LogLevel | null {
  if (opts.quiet) return null
  if (opts.debug) return 'debug'
  if (opts.warnings) return 'warn'
  return 'info'
}

function resolveLogFile(value: string | undefined): string | null {
  const file = value?.trim() ?? 'none'
  return file === '' || file.toLowerCase() === 'none' ? null : file
}

function resolveLogStream(value: string | undefined): LogStream | null {
  const stream = value?.trim().toLowerCase() ?? 'stdout'
  if (stream === 'stdout' || stream === 'stderr') {
    return stream
  }
  return null
}

export function parseCliOptions(
  argv: string[],
  readFile?: (file: string) => string
): CliOptions {
  const program = createProgram()
  program.parse(expandArgFiles(argv, readFile), { from: 'user' })
  const opts = program.opts<RawOptions>()

  return {
    logLevel: resolveLogLevel(opts),
    logFile: resolveLogFile(opts.logfile),
    logStream: resolveLogStream(opts.stream),
    entryFile: opts.entry ?? null,
  }
}
