import type { Logger } from '../logger'
import type { BsaEntry } from './bsa'
import { mkdir, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { glob } from 'glob'
import { ArchiveError } from '../errors'
import { decodeSourceText, writeTextFile } from '../io'
import { scopedLogger } from '../logger'
import { scriptKey } from '../scanner'
import { BsaReader } from './bsa'

export { BsaFlags, BsaReader, decodeEntryData, directorySize, parseBsaDirectory, parseBsaHeader } from './bsa'
export type { BsaDirectory, BsaEntry, BsaHeader, BsaVersion } from './bsa'

export interface ArchivedScript {
  /** Lower-cased script name */
  key: string
  type: 'psc' | 'pex'
  archivePath: string
  entry: BsaEntry
}

export interface ArchiveIndexOptions {
  /** Glob relative to the Data directory */
  archiveGlob?: string
  logger?: Logger
}

/**
 * Index of the scripts held in a Data directory's BSA archives.
 *
 * Loose files shadow archived ones, and among archives the first one
 * (in sorted path order) holding a file name wins.
 */
export class ArchiveIndex {
  readonly dataDir: string
  private readonly archiveGlob: string
  private readonly log: Logger
  private readonly readers = new Map<string, BsaReader>()
  private readonly sourceEntries = new Map<string, ArchivedScript>()
  private readonly compiledEntries = new Map<string, ArchivedScript>()

  constructor(dataDir: string, options: ArchiveIndexOptions = {}) {
    this.dataDir = dataDir
    this.archiveGlob = options.archiveGlob ?? '*.bsa'
    this.log = options.logger ?? scopedLogger('archive')
  }

  /** Archived `.psc` files by script name */
  get sources(): ReadonlyMap<string, ArchivedScript> {
    return this.sourceEntries
  }

  /** Archived `.pex` files by script name */
  get compiled(): ReadonlyMap<string, ArchivedScript> {
    return this.compiledEntries
  }

  async findArchives(): Promise<string[]> {
    const archives = await glob(this.archiveGlob, { cwd: this.dataDir, absolute: true, nodir: true, nocase: true })
    this.log.info(`Found ${archives.length} BSA files`)
    return archives.sort()
  }

  private async reader(archivePath: string): Promise<BsaReader> {
    let reader = this.readers.get(archivePath)
    if (!reader) {
      reader = await BsaReader.open(archivePath)
      this.readers.set(archivePath, reader)
    }
    return reader
  }

  /**
   * Index every archive's `.psc` and `.pex` entries.
   * `excluded` holds lower-cased file names (`actor.psc`) present as loose files.
   * An archive that cannot be read is logged and skipped.
   */
  async scan(excluded: ReadonlySet<string> = new Set()): Promise<void> {
    for (const archivePath of await this.findArchives()) {
      this.log.debug(`Scanning BSA: ${basename(archivePath)}`)

      let reader: BsaReader
      try {
        reader = await this.reader(archivePath)
      }
      catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        this.log.error(`Error scanning BSA ${archivePath}: ${message}`)
        continue
      }

      for (const entry of reader.entries) {
        const type = entry.name.endsWith('.psc') ? 'psc' : entry.name.endsWith('.pex') ? 'pex' : null
        if (!type) continue

        if (excluded.has(entry.name)) {
          this.log.debug(`Skipping BSA file ${entry.name} - loose file takes precedence`)
          continue
        }

        const target = type === 'psc' ? this.sourceEntries : this.compiledEntries
        const key = scriptKey(entry.name)
        if (!target.has(key)) {
          target.set(key, { key, type, archivePath, entry })
        }
      }
    }

    this.log.info(`Found ${this.sourceEntries.size + this.compiledEntries.size} script files in BSA archives`)
  }

  async read(script: ArchivedScript): Promise<Buffer> {
    const reader = await this.reader(script.archivePath)
    try {
      return await reader.read(script.entry)
    }
    catch (error) {
      if (error instanceof ArchiveError) throw error
      throw new ArchiveError('Could not read entry', script.archivePath, script.entry.path, error instanceof Error ? error : undefined)
    }
  }

  /**
   * Decoded text of an archived source file
   */
  async readText(script: ArchivedScript): Promise<string> {
    return decodeSourceText(await this.read(script))
  }

  /**
   * Write an archived file into `dir`, returning its path
   */
  async extractTo(script: ArchivedScript, dir: string): Promise<string> {
    const target = join(dir, basename(script.entry.path))
    const data = await this.read(script)

    if (script.type === 'psc') {
      await writeTextFile(target, decodeSourceText(data))
    }
    else {
      await mkdir(dir, { recursive: true })
      await writeFile(target, data)
    }

    this.log.debug(`Extracted ${script.entry.path} to ${target}`)
    return target
  }

  async close(): Promise<void> {
    for (const reader of this.readers.values()) {
      await reader.close()
    }
    this.readers.clear()
  }
}
