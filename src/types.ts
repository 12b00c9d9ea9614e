/**
 * HeaderGenerationConfig
 *
 * This is the configuration object for the header generation process.
 */
export interface HeaderGenerationConfig {
  cwd: string
  /**
   * Game `Data` directory, or the directory that contains it
   * @default 'Data'
   */
  baseDir: string
  /**
   * Directory the header stubs are written to
   * @default 'Headers'
   */
  outdir: string
  /**
   * Script name patterns, matched case-insensitively on word boundaries.
   * An empty list selects every script.
   * @example ['actor', 'potion']
   */
  patterns: string[]
  /**
   * File listing every artifact that could not be turned into a header
   * @default 'missing_source.txt'
   */
  missingLog: string
  /**
   * Log file mirroring console output. Empty string disables it.
   * @default 'errors.log'
   */
  logFile: string
  verbose: boolean
  /**
   * Scan BSA archives in the Data directory for scripts
   * @default false
   */
  enableArchives?: boolean
  /**
   * Glob (relative to the Data directory) selecting archives to scan
   * @default '*.bsa'
   */
  archiveGlob?: string
  /**
   * Fall back to Champollion for compiled scripts without source
   * @default false
   */
  decompile?: boolean
  /**
   * Path to Champollion.exe or the directory containing it
   */
  champollionPath?: string
  /**
   * @default 30000
   */
  decompileTimeoutMs?: number
  /**
   * Join lines ending in a backslash before parsing
   * @default true
   */
  joinContinuations?: boolean
  /**
   * Remove existing headers from the output directory first
   * @default false
   */
  clean?: boolean
  /**
   * Dry run mode - show what would be generated without writing files
   */
  dryRun?: boolean
  /**
   * Show statistics after generation
   */
  stats?: boolean
  /**
   * Log level for controlling output verbosity
   * @default 'info'
   */
  logLevel?: 'debug' | 'info' | 'warn' | 'error' | 'silent'
  /**
   * Output format for statistics: 'text' for human-readable, 'json' for machine-readable
   * @default 'text'
   */
  outputFormat?: 'text' | 'json'
  /**
   * Show progress during generation
   * @default false
   */
  progress?: boolean
  /**
   * Process scripts in concurrent batches
   * @default false
   */
  parallel?: boolean
  /**
   * Batch size for parallel processing
   * @default 4
   */
  concurrency?: number
}

export type HeaderGenerationOption = Partial<HeaderGenerationConfig>

/**
 * Signature of a `Function` declaration
 */
export interface FunctionSignature {
  readonly name: string
  readonly returnType?: string
  /** Raw parameter text, e.g. `Int aiCount = 1` */
  readonly parameters: readonly string[]
  /** Raw trailing modifiers, always including `native` */
  readonly flags: string
  readonly isNative: boolean
}

export interface EventSignature {
  readonly name: string
  readonly parameters: readonly string[]
}

export interface PropertySignature {
  readonly name: string
  readonly typeName: string
  readonly defaultValue?: string
  readonly flags: ReadonlySet<string>
}

/**
 * SourceUnit
 *
 * Declaration-level view of one parsed script. Built once, never mutated.
 */
export interface SourceUnit {
  readonly scriptName: string
  readonly extends?: string
  readonly scriptFlags: ReadonlySet<string>
  readonly functions: readonly FunctionSignature[]
  readonly events: readonly EventSignature[]
  readonly properties: readonly PropertySignature[]
}

export type DeclarationKind = 'function' | 'event' | 'property'

/**
 * A recognised declaration candidate, before structured extraction
 */
export interface DeclarationCandidate {
  kind: DeclarationKind
  text: string
  /** 1-based line in the preprocessed text */
  line: number
}

/**
 * A candidate that matched a declaration-start heuristic but not the full shape
 */
export interface MalformedDeclaration extends DeclarationCandidate {
  reason: string
}

export interface ParseResult {
  unit: SourceUnit
  malformed: MalformedDeclaration[]
}

/**
 * Where the parsed text of a script came from
 */
export type SourceOrigin = 'loose' | 'archive' | 'decompiled'

/**
 * Detailed error information for one file
 */
export interface HeaderError {
  file: string
  message: string
  code?: string
  stack?: string
  suggestion?: string
}

/**
 * Generation statistics
 */
export interface GenerationStats {
  filesProcessed: number
  headersGenerated: number
  filesFailed: number
  sourcesMissing: number
  functionsFound: number
  eventsFound: number
  propertiesFound: number
  malformedDropped: number
  durationMs: number
  errors: HeaderError[]
  /** Every artifact that produced no header, failed or missing */
  missing: string[]
}
