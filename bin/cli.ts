#!/usr/bin/env node
import type { CliOptions } from '../src/options'
import process from 'node:process'
import { CAC } from 'cac'
import { version } from '../package.json'
import { getConfig } from '../src/config'
import { formatHeaderError, isPscHeadersError } from '../src/errors'
import { generate, processSource } from '../src/generator'
import { readStreamText } from '../src/io'
import { cliCwd, resolveCliConfig } from '../src/options'

const cli = new CAC('psc-headers')

async function runGenerate(options: CliOptions): Promise<void> {
  try {
    const fileConfig = await getConfig(cliCwd(options))
    const config = resolveCliConfig(options, fileConfig)
    const stats = await generate(config)

    if (stats.filesFailed > 0 && stats.headersGenerated === 0) {
      process.exitCode = 1
    }
    else if (stats.filesFailed > 0) {
      process.exitCode = 2
    }
  }
  catch (error) {
    console.error('Error generating headers:', isPscHeadersError(error) ? error.toString() : error)
    process.exitCode = 1
  }
}

cli
  .command('[generate]', 'Generate Papyrus header stubs for compiled scripts')
  .option('--cwd <path>', 'Working directory (config file lookup and relative paths)')
  .option('--base-dir <path>', 'Directory containing the Data folder structure (default: Data)')
  .option('--output-dir, --outdir <path>', 'Output directory for header files (default: Headers)')
  .option('--pattern <pattern>', 'Script name pattern, matched on word boundaries (repeatable)')
  .option('--patternlist <patterns>', 'Comma-separated patterns; overrides --pattern')
  .option('--missing-log <file>', 'File listing scripts without usable source (default: missing_source.txt)')
  .option('--log-file <file>', 'File mirroring log output (default: errors.log)')
  .option('--enable-bsa', 'Scan BSA archives for scripts')
  .option('--archive-glob <glob>', 'Archives to scan, relative to Data (default: *.bsa)')
  .option('--decompile', 'Decompile .pex files without source using Champollion')
  .option('--champollion-path <path>', 'Champollion.exe or the directory containing it')
  .option('--decompile-timeout <ms>', 'Timeout per decompiled file (default: 30000)')
  .option('--dry-run', 'Show what would be generated without writing files')
  .option('--stats', 'Show statistics after generation')
  .option('--parallel', 'Process scripts in concurrent batches')
  .option('--concurrency <number>', 'Batch size with --parallel (default: 4)')
  .option('--output-format <format>', 'Statistics format: text or json')
  .option('--log-level <level>', 'Log level (debug, info, warn, error, silent)')
  .option('--progress', 'Show progress during generation')
  .option('--no-join-continuations', 'Do not join lines ending in a backslash')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--clean', 'Remove existing headers before generation')
  .example('psc-headers --base-dir "C:/Games/Skyrim Special Edition/Data"')
  .example('psc-headers --patternlist actor,potion --output-dir Headers')
  .example('psc-headers --enable-bsa --decompile --champollion-path tools/Champollion')
  .example('psc-headers --dry-run --stats --output-format json')
  .action(async (command: string | undefined, options: CliOptions) => {
    if (command !== undefined && command !== 'generate') {
      console.error(`Unknown command: ${command}`)
      process.exitCode = 1
      return
    }
    await runGenerate(options)
  })

cli
  .command('stdin', 'Read a Papyrus script from stdin and print its header to stdout')
  .option('--no-join-continuations', 'Do not join lines ending in a backslash')
  .example('cat Actor.psc | psc-headers stdin')
  .action(async (options: { joinContinuations?: boolean }) => {
    try {
      const source = await readStreamText(process.stdin)

      if (!source.trim()) {
        console.error('Error: No input received from stdin')
        process.exitCode = 1
        return
      }

      process.stdout.write(processSource(source, {
        filePath: 'stdin',
        joinContinuations: options.joinContinuations ?? true,
      }))
    }
    catch (error) {
      if (isPscHeadersError(error)) {
        console.error(formatHeaderError({ file: 'stdin', message: error.message, code: error.code }))
      }
      else {
        console.error('Error processing stdin:', error)
      }
      process.exitCode = 1
    }
  })

cli.command('version', 'Show the version of psc-headers').action(() => {
  console.log(version)
})

cli.version(version, '-V, --version')
cli.help()

cli.parse(process.argv, { run: false })
Promise.resolve(cli.runMatchedCommand()).catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
