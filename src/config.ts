import type { HeaderGenerationConfig, HeaderGenerationOption } from './types'
import { existsSync, readFileSync } from 'node:fs'
import { createRequire } from 'node:module'
import { basename, join, resolve } from 'node:path'
import process from 'node:process'
import { ConfigError } from './errors'
import { logger } from './logger'

export const defaultConfig: HeaderGenerationConfig = {
  cwd: process.cwd(),
  baseDir: 'Data',
  outdir: 'Headers',
  patterns: [],
  missingLog: 'missing_source.txt',
  logFile: 'errors.log',
  verbose: false,
  enableArchives: false,
  archiveGlob: '*.bsa',
  decompile: false,
  decompileTimeoutMs: 30_000,
  joinContinuations: true,
  clean: false,
  dryRun: false,
  stats: false,
  logLevel: 'info',
  outputFormat: 'text',
  progress: false,
  parallel: false,
  concurrency: 4,
}

/**
 * Configuration file names in order of priority
 */
const CONFIG_FILES = [
  'psc-headers.config.js',
  'psc-headers.config.cjs',
  'psc-headers.config.json',
]

const STRING_KEYS = ['cwd', 'baseDir', 'outdir', 'missingLog', 'logFile', 'archiveGlob', 'champollionPath'] as const
const BOOLEAN_KEYS = ['verbose', 'enableArchives', 'decompile', 'joinContinuations', 'clean', 'dryRun', 'stats', 'progress', 'parallel'] as const
const NUMBER_KEYS = ['decompileTimeoutMs', 'concurrency'] as const
const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
const OUTPUT_FORMATS = ['text', 'json'] as const

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some(candidate => candidate === value)
}

/**
 * Check a user-supplied object against the config shape
 */
export function validateConfig(raw: unknown, configPath?: string): HeaderGenerationOption {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be an object', { configPath })
  }

  const config: HeaderGenerationOption = {}
  const invalid = (key: string, expected: string): ConfigError =>
    new ConfigError(`Invalid value for "${key}": expected ${expected}`, { configPath, invalidKey: key })

  for (const key of STRING_KEYS) {
    const value = raw[key]
    if (value === undefined) continue
    if (typeof value !== 'string') throw invalid(key, 'a string')
    config[key] = value
  }

  for (const key of BOOLEAN_KEYS) {
    const value = raw[key]
    if (value === undefined) continue
    if (typeof value !== 'boolean') throw invalid(key, 'a boolean')
    config[key] = value
  }

  for (const key of NUMBER_KEYS) {
    const value = raw[key]
    if (value === undefined) continue
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) throw invalid(key, 'a positive number')
    config[key] = value
  }

  const patterns = raw.patterns
  if (patterns !== undefined) {
    if (!Array.isArray(patterns) || !patterns.every(p => typeof p === 'string')) throw invalid('patterns', 'an array of strings')
    config.patterns = patterns.filter((p): p is string => typeof p === 'string')
  }

  const logLevel = raw.logLevel
  if (logLevel !== undefined) {
    if (!isOneOf(LOG_LEVELS, logLevel)) throw invalid('logLevel', LOG_LEVELS.join(' | '))
    config.logLevel = logLevel
  }

  const outputFormat = raw.outputFormat
  if (outputFormat !== undefined) {
    if (!isOneOf(OUTPUT_FORMATS, outputFormat)) throw invalid('outputFormat', OUTPUT_FORMATS.join(' | '))
    config.outputFormat = outputFormat
  }

  const known = new Set<string>([...STRING_KEYS, ...BOOLEAN_KEYS, ...NUMBER_KEYS, 'patterns', 'logLevel', 'outputFormat'])
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) {
      logger.warn(`Ignoring unknown config key "${key}"${configPath ? ` in ${basename(configPath)}` : ''}`)
    }
  }

  return config
}

async function readConfigModule(configPath: string): Promise<unknown> {
  if (configPath.endsWith('.json')) {
    return JSON.parse(readFileSync(configPath, 'utf-8'))
  }

  const load = createRequire(configPath)
  const loaded: unknown = load(configPath)

  // Support both default export and named export
  const exported = isRecord(loaded) ? (loaded.default ?? loaded.config ?? loaded) : loaded

  // If it's a function, call it (allows async config)
  if (typeof exported === 'function') {
    const produced: unknown = await exported()
    return produced
  }
  return exported
}

/**
 * Find and load a psc-headers config file
 */
async function loadConfigFile(cwd: string): Promise<HeaderGenerationConfig | null> {
  for (const filename of CONFIG_FILES) {
    const configPath = resolve(cwd, filename)

    if (!existsSync(configPath)) continue

    let raw: unknown
    try {
      raw = await readConfigModule(configPath)
    }
    catch (error) {
      throw new ConfigError(`Failed to load config from ${filename}`, {
        configPath,
        cause: error instanceof Error ? error : undefined,
      })
    }

    return { ...defaultConfig, ...validateConfig(raw, configPath), cwd }
  }

  return null
}

let _config: HeaderGenerationConfig | null = null

/**
 * Get the configuration, loading from config file if available
 */
export async function getConfig(cwd: string = process.cwd()): Promise<HeaderGenerationConfig> {
  if (!_config) {
    _config = (await loadConfigFile(cwd)) ?? { ...defaultConfig, cwd }
  }
  return _config
}

/**
 * Reset the cached config (useful for testing)
 */
export function resetConfig(): void {
  _config = null
}

/**
 * Define a configuration with full type support
 *
 * @example
 * ```js
 * // psc-headers.config.js
 * const { defineConfig } = require('psc-headers')
 *
 * module.exports = defineConfig({
 *   baseDir: 'C:/Games/Skyrim Special Edition/Data',
 *   outdir: './Headers',
 *   enableArchives: true,
 * })
 * ```
 */
export function defineConfig(config: HeaderGenerationOption): HeaderGenerationConfig {
  return { ...defaultConfig, ...config }
}

/**
 * Resolve the compiled scripts directory from a Data directory or its parent
 */
export function resolveScriptsDir(baseDir: string, cwd: string = process.cwd()): string {
  const cleaned = baseDir.trim().replace(/^["']+|["']+$/g, '').replace(/[\\/]+$/, '')
  const base = resolve(cwd, cleaned)

  if (basename(base).toLowerCase() === 'data') {
    return join(base, 'Scripts')
  }
  return join(base, 'Data', 'Scripts')
}
