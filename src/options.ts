import type { HeaderGenerationConfig } from './types'
import { resolve } from 'node:path'
import process from 'node:process'
import { validateConfig } from './config'
import { parsePatternList } from './scanner'

type CliValue = string | number

/**
 * Options as cac hands them to the generate command. Numeric-looking
 * values arrive as numbers and repeated flags as arrays.
 */
export interface CliOptions {
  cwd?: CliValue
  baseDir?: CliValue
  outputDir?: CliValue
  outdir?: CliValue
  pattern?: CliValue | CliValue[]
  patternlist?: CliValue
  missingLog?: CliValue
  logFile?: CliValue
  enableBsa?: boolean
  archiveGlob?: CliValue
  decompile?: boolean
  champollionPath?: CliValue
  decompileTimeout?: CliValue
  dryRun?: boolean
  stats?: boolean
  parallel?: boolean
  concurrency?: CliValue
  outputFormat?: CliValue
  logLevel?: CliValue
  verbose?: boolean
  clean?: boolean
  progress?: boolean
  /** cac reports `true` unless `--no-join-continuations` is given */
  joinContinuations?: boolean
}

function text(value: CliValue | CliValue[] | undefined): string | undefined {
  if (value === undefined) return undefined
  return String(Array.isArray(value) ? value[value.length - 1] : value)
}

function count(value: CliValue | undefined): number | undefined {
  if (value === undefined) return undefined
  return typeof value === 'number' ? value : Number(value)
}

/**
 * Working directory the config file is looked up in
 */
export function cliCwd(options: CliOptions): string {
  return resolve(text(options.cwd) ?? process.cwd())
}

/**
 * Patterns from `--patternlist`, which overrides any `--pattern` flags
 */
export function cliPatterns(options: CliOptions): string[] | undefined {
  if (options.patternlist !== undefined) {
    return parsePatternList(String(options.patternlist))
  }
  if (options.pattern === undefined) {
    return undefined
  }
  const values = Array.isArray(options.pattern) ? options.pattern : [options.pattern]
  return values.map(String).map(p => p.trim()).filter(Boolean)
}

/**
 * Merge CLI flags over a loaded configuration: defaults < config file < flags.
 *
 * @throws ConfigError when a flag value is invalid
 */
export function resolveCliConfig(options: CliOptions, fileConfig: HeaderGenerationConfig): HeaderGenerationConfig {
  const overrides = validateConfig({
    baseDir: text(options.baseDir),
    outdir: text(options.outputDir ?? options.outdir),
    patterns: cliPatterns(options),
    missingLog: text(options.missingLog),
    logFile: text(options.logFile),
    enableArchives: options.enableBsa,
    archiveGlob: text(options.archiveGlob),
    decompile: options.decompile,
    champollionPath: text(options.champollionPath),
    decompileTimeoutMs: count(options.decompileTimeout),
    dryRun: options.dryRun,
    stats: options.stats,
    parallel: options.parallel,
    concurrency: count(options.concurrency),
    outputFormat: text(options.outputFormat),
    logLevel: text(options.logLevel),
    verbose: options.verbose,
    clean: options.clean,
    progress: options.progress,
    joinContinuations: options.joinContinuations === false ? false : undefined,
  })

  // validateConfig drops keys whose value is undefined
  return { ...fileConfig, ...overrides, cwd: fileConfig.cwd }
}
