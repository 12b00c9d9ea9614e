/**
 * Error handling utilities for psc-headers
 * Provides custom error classes and formatting utilities
 */

import type { HeaderError } from './types'

/**
 * Error codes for categorizing errors
 */
export const ErrorCodes = {
  // Parse errors
  MISSING_SCRIPT_DECLARATION: 'MISSING_SCRIPT_DECLARATION',

  // File errors
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
  FILE_WRITE_ERROR: 'FILE_WRITE_ERROR',

  // Collaborator errors
  ARCHIVE_ERROR: 'ARCHIVE_ERROR',
  DECOMPILER_ERROR: 'DECOMPILER_ERROR',

  // Config errors
  CONFIG_ERROR: 'CONFIG_ERROR',

  // Unknown
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes]

/**
 * Base error class for psc-headers errors
 */
export class PscHeadersError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: ErrorCode = 'UNKNOWN_ERROR', context?: Record<string, unknown>) {
    super(message)
    this.name = 'PscHeadersError'
    this.code = code
    this.context = context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /** Format error for logging */
  toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`
    if (this.context) {
      str += `\nContext: ${JSON.stringify(this.context, null, 2)}`
    }
    return str
  }

  /** Convert to JSON for serialization */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Source text has no `Scriptname` line
 */
export class MissingScriptDeclarationError extends PscHeadersError {
  readonly filePath?: string

  constructor(filePath?: string) {
    super('Could not find Scriptname declaration', 'MISSING_SCRIPT_DECLARATION', filePath ? { filePath } : undefined)
    this.name = 'MissingScriptDeclarationError'
    this.filePath = filePath
  }
}

/**
 * Error during file I/O operations
 */
export class FileError extends PscHeadersError {
  readonly filePath: string
  readonly operation: 'read' | 'write' | 'delete' | 'stat' | 'glob'

  constructor(message: string, filePath: string, operation: 'read' | 'write' | 'delete' | 'stat' | 'glob', cause?: Error) {
    super(message, operation === 'read' ? 'FILE_READ_ERROR' : 'FILE_WRITE_ERROR', { filePath, operation })
    this.name = 'FileError'
    this.filePath = filePath
    this.operation = operation
    if (cause) this.cause = cause
  }
}

/**
 * Error while reading a BSA archive
 */
export class ArchiveError extends PscHeadersError {
  readonly archivePath: string
  readonly entryPath?: string

  constructor(message: string, archivePath: string, entryPath?: string, cause?: Error) {
    super(message, 'ARCHIVE_ERROR', { archivePath, entryPath })
    this.name = 'ArchiveError'
    this.archivePath = archivePath
    this.entryPath = entryPath
    if (cause) this.cause = cause
  }
}

/**
 * Champollion could not be located or run
 */
export class DecompilerError extends PscHeadersError {
  readonly executable?: string

  constructor(message: string, executable?: string, cause?: Error) {
    super(message, 'DECOMPILER_ERROR', { executable })
    this.name = 'DecompilerError'
    this.executable = executable
    if (cause) this.cause = cause
  }
}

/**
 * Error during configuration loading or validation
 */
export class ConfigError extends PscHeadersError {
  readonly configPath?: string
  readonly invalidKey?: string

  constructor(message: string, options?: { configPath?: string, invalidKey?: string, cause?: Error }) {
    super(message, 'CONFIG_ERROR', { configPath: options?.configPath, invalidKey: options?.invalidKey })
    this.name = 'ConfigError'
    this.configPath = options?.configPath
    this.invalidKey = options?.invalidKey
    if (options?.cause) this.cause = options.cause
  }
}

/**
 * Type guards for error types
 */
export function isPscHeadersError(error: unknown): error is PscHeadersError {
  return error instanceof PscHeadersError
}

export function isMissingScriptDeclaration(error: unknown): error is MissingScriptDeclarationError {
  return error instanceof MissingScriptDeclarationError
}

/**
 * Wrap an unknown error in a PscHeadersError
 */
export function wrapError(error: unknown, code: ErrorCode = 'UNKNOWN_ERROR', message?: string): PscHeadersError {
  if (error instanceof PscHeadersError) return error
  const errorMessage = message || (error instanceof Error ? error.message : String(error))
  const wrapped = new PscHeadersError(errorMessage, code)
  if (error instanceof Error) wrapped.cause = error
  return wrapped
}

const SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  MISSING_SCRIPT_DECLARATION: 'The file needs a "Scriptname <Name>" line to produce a header.',
  FILE_NOT_FOUND: 'Check that the file path is correct and the file exists.',
  ARCHIVE_ERROR: 'The archive may be corrupt or use an unsupported compression; extract the script manually.',
  DECOMPILER_ERROR: 'Check --champollion-path or disable --decompile.',
}

/**
 * Create a HeaderError from an exception
 */
export function createHeaderError(error: unknown, file: string): HeaderError {
  const baseError: HeaderError = {
    file,
    message: 'Unknown error',
    code: ErrorCodes.UNKNOWN_ERROR,
  }

  if (error instanceof PscHeadersError) {
    baseError.message = error.message
    baseError.code = error.code
    baseError.stack = error.stack
    baseError.suggestion = SUGGESTIONS[error.code]
  }
  else if (error instanceof Error) {
    baseError.message = error.message
    baseError.stack = error.stack

    if ('code' in error && error.code === 'ENOENT') {
      baseError.code = ErrorCodes.FILE_NOT_FOUND
      baseError.suggestion = SUGGESTIONS.FILE_NOT_FOUND
    }
  }
  else if (typeof error === 'string') {
    baseError.message = error
  }

  return baseError
}

/**
 * Format a HeaderError for display
 */
export function formatHeaderError(error: HeaderError): string {
  const parts: string[] = []

  let header = error.file
  if (error.code) {
    header += ` [${error.code}]`
  }
  parts.push(header)
  parts.push(`  Error: ${error.message}`)

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`)
  }

  return parts.join('\n')
}

/**
 * Aggregate multiple errors into a summary
 */
export function summarizeErrors(errors: HeaderError[]): string {
  if (errors.length === 0) {
    return 'No errors'
  }

  const byCode = new Map<string, number>()
  for (const error of errors) {
    const code = error.code || 'UNKNOWN'
    byCode.set(code, (byCode.get(code) || 0) + 1)
  }

  const parts: string[] = [`${errors.length} error(s) found:`]

  for (const [code, count] of byCode.entries()) {
    parts.push(`  - ${code}: ${count}`)
  }

  return parts.join('\n')
}
