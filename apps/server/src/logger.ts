import { pino, type BaseLogger, type Logger } from 'pino'

// The subset of pino shared by standalone loggers and Fastify's request.log
export type EventLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>

export function createLogger(name: string, level: string = process.env.LOG_LEVEL || 'info'): Logger {
  // stdout is reserved for game results, so logs go to stderr
  return pino({ name, level }, process.stderr)
}
