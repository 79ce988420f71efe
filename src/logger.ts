import type { Writable } from 'stream'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

interface LogSink {
  level: LogLevel | null // null 表示完全静默
  outputs: Console[]
  clock: () => Date
}

export interface LoggerConfig {
  level?: LogLevel | null
  outputs?: Writable[]
  clock?: () => Date
}

export class Logger {
  readonly name: string
  private sink: LogSink

  constructor(name: string, sink?: LogSink) {
    this.name = name
    this.sink = sink ?? {
      level: 'info',
      outputs: [new console.Console(process.stdout)],
      clock: () => new Date(),
    }
  }

  // 子 logger 与父级共享级别和输出
  child(name: string): Logger {
    return new Logger(name, this.sink)
  }

  configure(config: LoggerConfig): void {
    if (config.level !== undefined) {
      this.sink.level = config.level
    }
    if (config.outputs) {
      this.sink.outputs = config.outputs.map((stream) => new console.Console(stream))
    }
    if (config.clock) {
      this.sink.clock = config.clock
    }
  }

  isEnabled(level: LogLevel): boolean {
    return (
      this.sink.level !== null &&
      LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.sink.level]
    )
  }

  debug(message: string): void {
    this.write('debug', message)
  }

  info(message: string): void {
    this.write('info', message)
  }

  warn(message: string): void {
    this.write('warn', message)
  }

  error(message: string): void {
    this.write('error', message)
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return
    }
    const line = `${this.sink.clock().toISOString()} [${level.toUpperCase()}] ${this.name}: ${message}`
    this.sink.outputs.forEach((output) => output.log(line))
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

export const logger = new Logger('tp.plugin.websockets')
