import type { Logger } from './logger'
import { stat } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import { glob } from 'glob'
import { FileError } from './errors'
import { scopedLogger } from './logger'

/**
 * Lower-cased file name without extension; scripts are matched on this
 */
export function scriptKey(filePath: string): string {
  return basename(filePath, extname(filePath)).toLowerCase()
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Build a predicate selecting scripts by name.
 *
 * Each pattern must appear as a whole word (case-insensitive) in the file
 * name or anywhere in the path: `actor` selects `Actor.psc` but not
 * `ActorBase.psc`. No patterns selects everything.
 */
export function createPatternMatcher(patterns: readonly string[]): (filePath: string) => boolean {
  const regexes = patterns
    .map(pattern => pattern.trim())
    .filter(Boolean)
    .map(pattern => new RegExp(`\\b${escapeRegExp(pattern)}\\b`, 'i'))

  if (regexes.length === 0) {
    return () => true
  }

  return (filePath: string) => {
    const stem = basename(filePath, extname(filePath))
    return regexes.some(regex => regex.test(stem) || regex.test(filePath))
  }
}

/**
 * Split a comma-separated pattern list
 */
export function parsePatternList(list: string): string[] {
  return list.split(',').map(p => p.trim()).filter(Boolean)
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  }
  catch {
    return false
  }
}

export interface ScannerOptions {
  logger?: Logger
}

/**
 * Finds compiled scripts and their sources under a game `Data/Scripts` directory.
 */
export class ScriptScanner {
  readonly scriptsDir: string
  readonly dataDir: string
  /** Source roots in precedence order */
  readonly sourceRoots: readonly string[]
  private readonly log: Logger

  constructor(scriptsDir: string, options: ScannerOptions = {}) {
    this.scriptsDir = scriptsDir
    this.dataDir = dirname(scriptsDir)
    this.sourceRoots = [
      join(this.dataDir, 'Source', 'Scripts'),
      join(this.dataDir, 'Scripts', 'Source'),
      join(this.dataDir, 'Scripts'),
    ]
    this.log = options.logger ?? scopedLogger('scanner')
  }

  private async scan(root: string, extension: string): Promise<string[]> {
    if (!await isDirectory(root)) {
      this.log.debug(`Skipping missing directory ${root}`)
      return []
    }

    try {
      const files = await glob(`**/*${extension}`, { cwd: root, absolute: true, nodir: true, nocase: true })
      return files.sort()
    }
    catch (error) {
      throw new FileError(`Could not scan ${root}`, root, 'glob', error instanceof Error ? error : undefined)
    }
  }

  /**
   * All `.psc` files, keyed by script name. The first root holding a name wins.
   */
  async findSourceFiles(): Promise<Map<string, string>> {
    const sources = new Map<string, string>()

    for (const root of this.sourceRoots) {
      for (const file of await this.scan(root, '.psc')) {
        const key = scriptKey(file)
        if (!sources.has(key)) {
          sources.set(key, file)
        }
      }
    }

    this.log.info(`Cached ${sources.size} .psc files`)
    return sources
  }

  /**
   * All `.pex` files under the scripts directory, keyed by script name
   */
  async findCompiledFiles(): Promise<Map<string, string>> {
    const compiled = new Map<string, string>()

    for (const file of await this.scan(this.scriptsDir, '.pex')) {
      const key = scriptKey(file)
      if (!compiled.has(key)) {
        compiled.set(key, file)
      }
    }

    this.log.info(`Found ${compiled.size} .pex files`)
    return compiled
  }
}
