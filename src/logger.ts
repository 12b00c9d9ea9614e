/**
 * Levelled logging for psc-headers.
 * Records go to the console unless an output sink is installed; the CLI
 * installs a file sink so that a run leaves a log behind.
 */

import { appendFileSync, writeFileSync } from 'node:fs'
import process from 'node:process'
import { format } from 'node:util'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type LogOutput = (level: LogLevel, ...args: unknown[]) => void

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const ROOT_PREFIX = '[psc-headers]'

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  /** Logger whose prefix carries an extra scope: `[psc-headers:scope]` */
  child: (scope: string) => Logger
  /** Start a timer; calling the result logs the elapsed time at debug level */
  time: (label: string) => () => void
  /** Info-level status line, rewritten in place on a TTY */
  progress: (message: string) => void
}

let currentLevel: LogLevel = 'info'
let sink: LogOutput | null = null
// A progress line is on screen without its newline
let progressPending = false

function enabled(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[currentLevel]
}

/**
 * Write to the console method matching the level
 */
function consoleOutput(level: LogLevel, ...args: unknown[]): void {
  if (progressPending) {
    process.stdout.write('\n')
    progressPending = false
  }

  switch (level) {
    case 'debug':
      console.debug(...args)
      break
    case 'info':
      console.log(...args)
      break
    case 'warn':
      console.warn(...args)
      break
    case 'error':
      console.error(...args)
      break
  }
}

function emit(level: LogLevel, prefix: string, args: unknown[]): void {
  if (!enabled(level)) return
  const write = sink ?? consoleOutput
  write(level, prefix, ...args)
}

function scoped(prefix: string): Logger {
  return {
    debug: (...args) => emit('debug', prefix, args),
    info: (...args) => emit('info', prefix, args),
    warn: (...args) => emit('warn', prefix, args),
    error: (...args) => emit('error', prefix, args),
    child: scope => scoped(`${prefix.slice(0, -1)}:${scope}]`),
    time: (label) => {
      const start = performance.now()
      return () => emit('debug', prefix, [`${label}: ${(performance.now() - start).toFixed(2)}ms`])
    },
    progress: (message) => {
      if (!enabled('info')) return
      if (!sink && process.stdout.isTTY) {
        process.stdout.write(`\r${prefix} ${message}`)
        progressPending = true
        return
      }
      emit('info', prefix, [message])
    },
  }
}

/**
 * Root logger
 */
export const logger: Logger = scoped(ROOT_PREFIX)

/**
 * Logger for one module
 * @example
 * const log = scopedLogger('scanner')
 * log.debug('Caching sources...') // [psc-headers:scanner] Caching sources...
 */
export function scopedLogger(scope: string): Logger {
  return logger.child(scope)
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

/**
 * Replace the output sink; `null` restores console output
 */
export function setLogOutput(output: LogOutput | null): void {
  sink = output
}

/**
 * Console output that also appends each record to `filePath`.
 * The file is truncated when the sink is created.
 */
export function createFileSink(filePath: string, forward: LogOutput = consoleOutput): LogOutput {
  writeFileSync(filePath, '')

  return (level, ...args) => {
    forward(level, ...args)
    appendFileSync(filePath, `${new Date().toISOString()} - ${level.toUpperCase()} - ${format(...args)}\n`)
  }
}

/**
 * Logger that drops everything
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => nullLogger,
  time: () => () => {},
  progress: () => {},
}
