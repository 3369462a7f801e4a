import pino from 'pino'

export type { Logger } from 'pino'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

type LogLevel = (typeof LOG_LEVELS)[number]

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase()
  return isLogLevel(normalized) ? normalized : 'info'
}

export function createLogger(level: string | undefined = process.env.LOG_LEVEL) {
  // stdout carries command results, so logs go to stderr
  return pino(
    {
      name: 'redfish-ctl',
      level: resolveLogLevel(level),
      redact: ['password', 'authorization', '*.password', '*.authorization'],
    },
    pino.destination(2),
  )
}

export const logger = createLogger()
