/**
 * File and process helpers shared by the scanner, archive reader,
 * decompiler and generator.
 */

import { spawn } from 'node:child_process'
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { FileError } from './errors'

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Decode script source bytes: strict UTF-8 first, Latin-1 when that fails.
 * A UTF-8 byte order mark is dropped.
 */
export function decodeSourceText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes)
  }
  catch {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')
  }
}

/**
 * Read a script source file from disk
 */
export async function readSourceText(filePath: string): Promise<string> {
  let bytes: Buffer
  try {
    bytes = await readFile(filePath)
  }
  catch (error) {
    throw new FileError(`Could not read ${filePath}`, filePath, 'read', error instanceof Error ? error : undefined)
  }
  return decodeSourceText(bytes)
}

/**
 * Drain a stream (stdin) and decode it like a source file
 */
export async function readStreamText(stream: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk)
  }
  return decodeSourceText(Buffer.concat(chunks))
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile()
  }
  catch {
    return false
  }
}

/**
 * Write text with LF line endings and a trailing newline, creating parent directories
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  let normalized = content.replace(/\r\n/g, '\n')
  if (!normalized.endsWith('\n')) {
    normalized += '\n'
  }

  try {
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, normalized, 'utf-8')
  }
  catch (error) {
    throw new FileError(`Could not write ${filePath}`, filePath, 'write', error instanceof Error ? error : undefined)
  }
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
  timedOut: boolean
}

export interface CommandOptions {
  cwd?: string
  timeoutMs?: number
}

/**
 * Runs an executable to completion. Injected where tests need a fake.
 */
export type CommandRunner = (executable: string, args: string[], options?: CommandOptions) => Promise<CommandResult>

/**
 * Spawn a process and collect its output; kills it after `timeoutMs`
 */
export const runCommand: CommandRunner = (executable, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const proc = spawn(executable, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    })

    let stdout = ''
    let stderr = ''
    let timedOut = false

    proc.stdout.setEncoding('utf-8')
    proc.stderr.setEncoding('utf-8')
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk
    })
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk
    })

    const timer = options.timeoutMs
      ? setTimeout(() => {
        timedOut = true
        proc.kill()
      }, options.timeoutMs)
      : null

    proc.on('error', (error) => {
      if (timer) clearTimeout(timer)
      reject(error)
    })

    proc.on('close', (code) => {
      if (timer) clearTimeout(timer)
      resolve({ exitCode: code ?? 1, stdout, stderr, timedOut })
    })
  })
}
