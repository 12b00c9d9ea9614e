import type { CommandRunner } from './io'
import type { Logger } from './logger'
import { existsSync, statSync } from 'node:fs'
import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { basename, extname, join, resolve } from 'node:path'
import process from 'node:process'
import { DecompilerError } from './errors'
import { fileExists, runCommand } from './io'
import { scopedLogger } from './logger'

const EXECUTABLE_NAME = 'Champollion.exe'

/**
 * Locations tried when no path is configured
 */
export const CHAMPOLLION_SEARCH_PATHS = [
  EXECUTABLE_NAME,
  'C:\\Program Files\\Champollion\\Champollion.exe',
  'C:\\Program Files (x86)\\Champollion\\Champollion.exe',
]

export interface DecompilerOptions {
  enabled: boolean
  /** Champollion.exe, or the directory containing it */
  champollionPath?: string
  /** Directory a relative `champollionPath` resolves against */
  cwd?: string
  timeoutMs?: number
  runner?: CommandRunner
  logger?: Logger
}

/**
 * Resolve the Champollion executable.
 *
 * @throws DecompilerError when a configured path is invalid or nothing is found
 */
export function locateChampollion(champollionPath?: string, cwd: string = process.cwd()): string {
  if (!champollionPath) {
    for (const candidate of CHAMPOLLION_SEARCH_PATHS) {
      const path = resolve(cwd, candidate)
      if (existsSync(path)) return path
    }
    throw new DecompilerError(
      'Decompilation is enabled but Champollion.exe was not found. Specify it with --champollion-path.',
    )
  }

  const path = resolve(cwd, champollionPath)
  if (!existsSync(path)) {
    throw new DecompilerError(`Invalid Champollion path: ${champollionPath}`, path)
  }

  if (statSync(path).isDirectory()) {
    const executable = join(path, EXECUTABLE_NAME)
    if (!existsSync(executable)) {
      throw new DecompilerError(`Champollion.exe not found in directory: ${path}`, executable)
    }
    return executable
  }

  return path
}

/**
 * Decompiles `.pex` files with Champollion when no source is available.
 */
export class ChampollionDecompiler {
  readonly executable: string | null
  private readonly timeoutMs: number
  private readonly runner: CommandRunner
  private readonly log: Logger
  private tempDir: string | null = null

  constructor(options: DecompilerOptions) {
    this.log = options.logger ?? scopedLogger('decompiler')
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.runner = options.runner ?? runCommand

    if (options.enabled) {
      this.executable = locateChampollion(options.champollionPath, options.cwd)
      this.log.info(`Using Champollion at: ${this.executable}`)
    }
    else {
      this.executable = null
      this.log.debug('Decompilation disabled')
    }
  }

  isAvailable(): boolean {
    return this.executable !== null
  }

  /**
   * Scratch directory for decompiled and extracted files, created on first use
   */
  async workDir(): Promise<string> {
    if (!this.tempDir) {
      this.tempDir = await mkdtemp(join(tmpdir(), 'psc-headers-decompile-'))
      this.log.debug(`Decompile temp dir: ${this.tempDir}`)
    }
    return this.tempDir
  }

  /**
   * Decompile one `.pex`. Returns the produced `.psc` path, or `null` when
   * no source could be produced.
   */
  async decompile(pexFile: string): Promise<string | null> {
    if (!this.executable) {
      this.log.debug('Decompilation not available')
      return null
    }

    if (!await fileExists(pexFile)) {
      this.log.error(`PEX file does not exist: ${pexFile}`)
      return null
    }

    const outputDir = join(await this.workDir(), 'decompiled')
    await mkdir(outputDir, { recursive: true })

    const args = [pexFile, '--psc', outputDir]
    this.log.debug(`Running Champollion: ${this.executable} ${args.join(' ')}`)

    let result
    try {
      result = await this.runner(this.executable, args, { timeoutMs: this.timeoutMs })
    }
    catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.log.error(`Error decompiling ${basename(pexFile)}: ${message}`)
      return null
    }

    if (result.timedOut) {
      this.log.error(`Champollion timed out while decompiling ${basename(pexFile)}`)
      return null
    }
    if (result.exitCode !== 0) {
      this.log.error(`Champollion failed for ${basename(pexFile)}: ${result.stderr.trim()}`)
      return null
    }

    const expected = join(outputDir, `${basename(pexFile, extname(pexFile))}.psc`)
    if (!await fileExists(expected)) {
      this.log.error(`Expected decompiled file not found: ${expected}`)
      return null
    }

    this.log.debug(`Decompiled ${basename(pexFile)} -> ${expected}`)
    return expected
  }

  /**
   * Check that the executable answers `--help` with its banner
   */
  async selfTest(): Promise<boolean> {
    if (!this.executable) return false

    try {
      const result = await this.runner(this.executable, ['--help'], { timeoutMs: 10_000 })
      // Champollion prints its help with a non-zero exit code
      if (result.stdout.includes('Champollion PEX decompiler')) {
        return true
      }
      this.log.error(`Champollion test failed - unexpected output: ${result.stdout.trim()}`)
      return false
    }
    catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.log.error(`Error testing Champollion: ${message}`)
      return false
    }
  }

  /**
   * Remove the scratch directory
   */
  async dispose(): Promise<void> {
    if (!this.tempDir) return
    const dir = this.tempDir
    this.tempDir = null
    await rm(dir, { recursive: true, force: true })
    this.log.debug(`Cleaned up decompile temp dir: ${dir}`)
  }
}
