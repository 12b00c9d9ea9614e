import type { ArchivedScript } from './archive'
import type { CommandRunner } from './io'
import type { ParseOptions } from './parser'
import type { GenerationStats, HeaderError, HeaderGenerationConfig, HeaderGenerationOption, SourceOrigin, SourceUnit } from './types'
import { mkdir, rm } from 'node:fs/promises'
import { basename, join, relative, resolve } from 'node:path'
import { ArchiveIndex } from './archive'
import { defaultConfig, resolveScriptsDir } from './config'
import { ChampollionDecompiler } from './decompiler'
import { headerFileName, renderHeader } from './emitter'
import { ArchiveError, createHeaderError, formatHeaderError } from './errors'
import { readSourceText, writeTextFile } from './io'
import { createFileSink, logger, setLogLevel, setLogOutput } from './logger'
import { parse, parseSource } from './parser'
import { createPatternMatcher, ScriptScanner } from './scanner'

/**
 * Everything known about one script name
 */
export interface ScriptArtifacts {
  key: string
  source?: string
  archivedSource?: ArchivedScript
  compiled?: string
  archivedCompiled?: ArchivedScript
}

export interface ResolvedSource {
  text: string
  origin: SourceOrigin
  /** Where the text came from, for messages */
  path: string
}

export interface GenerateDependencies {
  /** Runs Champollion; defaults to spawning the process */
  runner?: CommandRunner
}

type ScriptResult =
  | { status: 'generated', file: string, unit: SourceUnit }
  | { status: 'missing', file: string }
  | { status: 'failed', file: string, error: HeaderError }

/**
 * Display path of a script's primary artifact
 */
export function artifactLabel(artifacts: ScriptArtifacts): string {
  if (artifacts.source) return artifacts.source
  if (artifacts.compiled) return artifacts.compiled
  const archived = artifacts.archivedSource ?? artifacts.archivedCompiled
  if (archived) return `${archived.archivePath}:${archived.entry.path}`
  return artifacts.key
}

function artifactPaths(artifacts: ScriptArtifacts): string[] {
  const paths: string[] = []
  if (artifacts.source) paths.push(artifacts.source)
  if (artifacts.compiled) paths.push(artifacts.compiled)
  if (artifacts.archivedSource) paths.push(artifacts.archivedSource.entry.path)
  if (artifacts.archivedCompiled) paths.push(artifacts.archivedCompiled.entry.path)
  return paths
}

function artifactsFor(scripts: Map<string, ScriptArtifacts>, key: string): ScriptArtifacts {
  let artifacts = scripts.get(key)
  if (!artifacts) {
    artifacts = { key }
    scripts.set(key, artifacts)
  }
  return artifacts
}

/**
 * Collect every script under the Data directory, keyed by lower-cased name
 */
export async function discoverScripts(
  scanner: ScriptScanner,
  archives: ArchiveIndex | null,
  patterns: readonly string[],
): Promise<ScriptArtifacts[]> {
  const scripts = new Map<string, ScriptArtifacts>()
  const sources = await scanner.findSourceFiles()
  const compiled = await scanner.findCompiledFiles()

  for (const [key, path] of sources) {
    artifactsFor(scripts, key).source = path
  }
  for (const [key, path] of compiled) {
    artifactsFor(scripts, key).compiled = path
  }

  if (archives) {
    const looseNames = new Set([...sources.values(), ...compiled.values()].map(path => basename(path).toLowerCase()))
    await archives.scan(looseNames)

    for (const [key, script] of archives.sources) {
      artifactsFor(scripts, key).archivedSource = script
    }
    for (const [key, script] of archives.compiled) {
      artifactsFor(scripts, key).archivedCompiled = script
    }
  }

  const matches = createPatternMatcher(patterns)
  return [...scripts.values()]
    .filter(artifacts => artifactPaths(artifacts).some(matches))
    .sort((a, b) => a.key.localeCompare(b.key))
}

/**
 * Find text to parse for a script: loose source, then archived source,
 * then a decompiled `.pex`. `null` means no source is available.
 */
export async function resolveSource(
  artifacts: ScriptArtifacts,
  archives: ArchiveIndex | null,
  decompiler: ChampollionDecompiler,
): Promise<ResolvedSource | null> {
  if (artifacts.source) {
    return { text: await readSourceText(artifacts.source), origin: 'loose', path: artifacts.source }
  }

  if (artifacts.archivedSource && archives) {
    const path = artifactLabel({ key: artifacts.key, archivedSource: artifacts.archivedSource })
    try {
      const text = await archives.readText(artifacts.archivedSource)
      logger.debug(`Using BSA source for ${artifacts.key}`)
      return { text, origin: 'archive', path }
    }
    catch (error) {
      // An unreadable entry counts as no archived source
      if (!(error instanceof ArchiveError)) throw error
      logger.warn(`Could not read ${path}: ${error.message}`)
    }
  }

  if (!decompiler.isAvailable()) {
    return null
  }

  let pexFile = artifacts.compiled
  if (!pexFile && artifacts.archivedCompiled && archives) {
    pexFile = await archives.extractTo(artifacts.archivedCompiled, join(await decompiler.workDir(), 'extracted'))
  }
  if (!pexFile) {
    return null
  }

  const decompiled = await decompiler.decompile(pexFile)
  if (!decompiled) {
    return null
  }

  return { text: await readSourceText(decompiled), origin: 'decompiled', path: decompiled }
}

/**
 * Render a header straight from source text
 *
 * @throws MissingScriptDeclarationError when the text has no `Scriptname` line
 */
export function processSource(text: string, options?: ParseOptions): string {
  return renderHeader(parse(text, options))
}

function printStats(stats: GenerationStats, config: HeaderGenerationConfig): void {
  if (config.outputFormat === 'json') {
    console.log(JSON.stringify(stats, null, 2))
    return
  }

  logger.info('\n--- Generation Statistics ---')
  logger.info(`Files processed:     ${stats.filesProcessed}`)
  logger.info(`Headers generated:   ${stats.headersGenerated}`)
  if (stats.filesFailed > 0) {
    logger.info(`Files failed:        ${stats.filesFailed}`)
  }
  if (stats.sourcesMissing > 0) {
    logger.info(`Sources missing:     ${stats.sourcesMissing}`)
  }
  logger.info(`Functions found:     ${stats.functionsFound}`)
  logger.info(`Events found:        ${stats.eventsFound}`)
  logger.info(`Properties found:    ${stats.propertiesFound}`)
  if (stats.malformedDropped > 0) {
    logger.info(`Malformed dropped:   ${stats.malformedDropped}`)
  }
  logger.info(`Duration:            ${stats.durationMs}ms`)
  logger.info('-----------------------------\n')
}

/**
 * Generate header stubs for every script under the configured Data directory
 */
export async function generate(options?: HeaderGenerationOption, deps: GenerateDependencies = {}): Promise<GenerationStats> {
  const startTime = Date.now()
  const endTimer = logger.time('Header generation')
  const config: HeaderGenerationConfig = { ...defaultConfig, ...options }

  if (config.verbose) {
    setLogLevel('debug')
  }
  else if (config.logLevel) {
    setLogLevel(config.logLevel)
  }

  const usingLogFile = config.logFile !== ''
  if (usingLogFile) {
    setLogOutput(createFileSink(resolve(config.cwd, config.logFile)))
  }

  const stats: GenerationStats = {
    filesProcessed: 0,
    headersGenerated: 0,
    filesFailed: 0,
    sourcesMissing: 0,
    functionsFound: 0,
    eventsFound: 0,
    propertiesFound: 0,
    malformedDropped: 0,
    durationMs: 0,
    errors: [],
    missing: [],
  }

  const scriptsDir = resolveScriptsDir(config.baseDir, config.cwd)
  const outdir = resolve(config.cwd, config.outdir)

  logger.debug('Starting header generation...')
  logger.debug(`Scripts directory: ${scriptsDir}`)
  logger.debug(`Output directory: ${outdir}`)
  logger.debug(`BSA support: ${config.enableArchives ? 'enabled' : 'disabled'}`)

  const scanner = new ScriptScanner(scriptsDir)
  const archives = config.enableArchives
    ? new ArchiveIndex(scanner.dataDir, { archiveGlob: config.archiveGlob })
    : null
  let decompiler: ChampollionDecompiler | null = null

  try {
    decompiler = new ChampollionDecompiler({
      enabled: config.decompile ?? false,
      champollionPath: config.champollionPath,
      cwd: config.cwd,
      timeoutMs: config.decompileTimeoutMs,
      runner: deps.runner,
    })
    const activeDecompiler = decompiler

    const scripts = await discoverScripts(scanner, archives, config.patterns)
    logger.info(`Found ${scripts.length} scripts${config.patterns.length > 0 ? ` matching ${config.patterns.join(', ')}` : ''}`)

    if (!config.dryRun) {
      if (config.clean) {
        logger.debug(`Cleaning ${outdir}`)
        await rm(outdir, { recursive: true, force: true })
      }
      await mkdir(outdir, { recursive: true })
    }

    if (config.progress && scripts.length > 0) {
      const mode = config.parallel ? 'parallel' : 'sequential'
      logger.info(`Processing ${scripts.length} scripts (${mode})...`)
    }

    const processScript = async (artifacts: ScriptArtifacts): Promise<ScriptResult> => {
      const file = artifactLabel(artifacts)
      try {
        const source = await resolveSource(artifacts, archives, activeDecompiler)
        if (!source) {
          return { status: 'missing', file }
        }

        const { unit, malformed } = parseSource(source.text, {
          filePath: source.path,
          joinContinuations: config.joinContinuations,
        })
        for (const candidate of malformed) {
          logger.debug(`Dropped ${candidate.kind} in ${source.path}:${candidate.line} (${candidate.reason}): ${candidate.text}`)
        }
        stats.malformedDropped += malformed.length

        const outputPath = join(outdir, headerFileName(unit))
        const header = renderHeader(unit)

        if (config.dryRun) {
          logger.info(`[dry-run] Would generate: ${relative(config.cwd, outputPath)}`)
          logger.debug(header)
        }
        else {
          await writeTextFile(outputPath, header)
          logger.debug(`Generated header from ${source.origin} source: ${outputPath}`)
        }

        return { status: 'generated', file, unit }
      }
      catch (error) {
        return { status: 'failed', file, error: createHeaderError(error, file) }
      }
    }

    const record = (result: ScriptResult): void => {
      stats.filesProcessed++
      switch (result.status) {
        case 'generated':
          stats.headersGenerated++
          stats.functionsFound += result.unit.functions.length
          stats.eventsFound += result.unit.events.length
          stats.propertiesFound += result.unit.properties.length
          break
        case 'missing':
          stats.sourcesMissing++
          stats.missing.push(result.file)
          logger.warn(`No source available for: ${result.file}`)
          break
        case 'failed':
          stats.filesFailed++
          stats.errors.push(result.error)
          stats.missing.push(result.file)
          logger.error(formatHeaderError(result.error))
          break
      }
    }

    const showProgress = (): void => {
      if (config.progress) {
        const percent = Math.round((stats.filesProcessed / scripts.length) * 100)
        logger.progress(`Progress: ${stats.filesProcessed}/${scripts.length} scripts (${percent}%)`)
      }
    }

    if (config.parallel) {
      const concurrency = config.concurrency || 4
      for (let i = 0; i < scripts.length; i += concurrency) {
        const batch = scripts.slice(i, i + concurrency)
        const results = await Promise.all(batch.map(processScript))
        results.forEach(record)
        showProgress()
      }
    }
    else {
      for (const artifacts of scripts) {
        record(await processScript(artifacts))
        showProgress()
      }
    }

    if (stats.missing.length > 0) {
      logger.warn(`Could not process ${stats.missing.length} files`)
      if (config.missingLog && !config.dryRun) {
        const missingLog = resolve(config.cwd, config.missingLog)
        await writeTextFile(missingLog, stats.missing.join('\n'))
        logger.warn(`Missing sources logged to: ${missingLog}`)
      }
    }

    stats.durationMs = Date.now() - startTime
    endTimer()

    logger.info(`Successfully processed ${stats.headersGenerated} files`)
    if (!config.dryRun) {
      logger.info(`Generated headers in: ${outdir}`)
    }

    if (config.stats) {
      printStats(stats, config)
    }

    return stats
  }
  finally {
    await decompiler?.dispose()
    await archives?.close()
    if (usingLogFile) {
      setLogOutput(null)
    }
  }
}
