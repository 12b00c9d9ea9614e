/**
 * Papyrus signature parser.
 *
 * raw text -> preprocess -> recognise declaration candidates -> extract
 * signatures -> assemble a SourceUnit. Pure: no I/O and no shared state,
 * so files can be parsed concurrently.
 */

import type { DeclarationCandidate, EventSignature, FunctionSignature, MalformedDeclaration, ParseResult, PropertySignature, SourceUnit } from '../types'
import type { HeaderMatch } from './recognizer'
import type { PreprocessOptions } from './preprocess'
import { MissingScriptDeclarationError } from '../errors'
import { preprocess } from './preprocess'
import { recognizeDeclarations } from './recognizer'
import { collectFlags, extractEvent, extractFunction, extractProperty } from './signatures'

export { preprocess } from './preprocess'
export type { PreprocessOptions } from './preprocess'
export { collectDeclarations, findEventDeclarations, findFunctionDeclarations, findPropertyDeclarations, findScriptHeader, parenBalance, PROPERTY_FLAGS, recognizeDeclarations, SCRIPT_FLAGS } from './recognizer'
export type { HeaderMatch, PropertyMatch, RecognizedDeclarations } from './recognizer'
export { extractEvent, extractFunction, extractProperty, isStubbableProperty, splitParameters } from './signatures'

export interface ParseOptions extends PreprocessOptions {
  /** Reported on MissingScriptDeclarationError */
  filePath?: string
}

/**
 * Build the immutable SourceUnit from extracted parts
 */
export function assemble(
  header: HeaderMatch | undefined,
  functions: FunctionSignature[],
  events: EventSignature[],
  properties: PropertySignature[],
  filePath?: string,
): SourceUnit {
  if (!header) {
    throw new MissingScriptDeclarationError(filePath)
  }

  return Object.freeze({
    scriptName: header.scriptName,
    extends: header.extends,
    scriptFlags: collectFlags(header.flagsText),
    functions: Object.freeze([...functions]),
    events: Object.freeze([...events]),
    properties: Object.freeze([...properties]),
  })
}

function extractAll<T>(
  candidates: DeclarationCandidate[],
  extract: (text: string) => T | null,
  malformed: MalformedDeclaration[],
): T[] {
  const signatures: T[] = []
  for (const candidate of candidates) {
    const signature = extract(candidate.text)
    if (signature) {
      signatures.push(signature)
    }
    else {
      malformed.push({ ...candidate, reason: `not a well-formed ${candidate.kind} declaration` })
    }
  }
  return signatures
}

/**
 * Parse source text, also returning the declaration candidates that were dropped
 */
export function parseSource(text: string, options: ParseOptions = {}): ParseResult {
  const cleaned = preprocess(text, options)
  const recognized = recognizeDeclarations(cleaned)
  const malformed: MalformedDeclaration[] = []

  const functions = extractAll(recognized.functions, extractFunction, malformed)
  const events = extractAll(recognized.events, extractEvent, malformed)

  const properties: PropertySignature[] = []
  for (const match of recognized.properties) {
    const property = extractProperty(match)
    if (property) properties.push(property)
  }

  return {
    unit: assemble(recognized.header, functions, events, properties, options.filePath),
    malformed,
  }
}

/**
 * Parse source text into a SourceUnit
 *
 * @throws MissingScriptDeclarationError when the text has no `Scriptname` line
 */
export function parse(text: string, options?: ParseOptions): SourceUnit {
  return parseSource(text, options).unit
}
