/**
 * Line-shape recognition over preprocessed Papyrus text.
 *
 * Recognition is purely textual: any line with the shape of a declaration
 * is one, wherever it sits (inside a State block, a full property's
 * accessors, and so on).
 */

import type { DeclarationCandidate, DeclarationKind } from '../types'

export const SCRIPT_FLAGS = ['Hidden', 'Conditional', 'Native', 'Const', 'Default', 'BetaOnly', 'DebugOnly'] as const
export const PROPERTY_FLAGS = ['AutoReadOnly', 'Auto', 'Hidden', 'Conditional', 'Const', 'Mandatory'] as const

// Identifier, optionally an array type: `Int`, `ObjectReference[]`
const TYPE = String.raw`\w+(?:\[\])?`
const WS = '[ \\t]'

const SCRIPT_HEADER = new RegExp(
  `^${WS}*Scriptname${WS}+(\\w+)(?:${WS}+extends${WS}+(\\w+))?((?:${WS}+(?:${SCRIPT_FLAGS.join('|')})\\b)*)${WS}*$`,
  'im',
)

const FUNCTION_START = new RegExp(`^${WS}*(?:${TYPE}${WS}+)?Function${WS}+\\w+${WS}*\\(`, 'i')
const EVENT_START = new RegExp(`^${WS}*Event${WS}+\\w+${WS}*\\(`, 'i')

const PROPERTY_LINE = new RegExp(
  `^${WS}*(${TYPE})${WS}+Property${WS}+(\\w+)(?:${WS}*=${WS}*([^;\\r\\n]*?))?((?:${WS}+(?:${PROPERTY_FLAGS.join('|')})\\b)*)${WS}*$`,
  'gim',
)

export interface HeaderMatch {
  scriptName: string
  extends?: string
  flagsText: string
  line: number
}

export interface PropertyMatch extends DeclarationCandidate {
  kind: 'property'
  typeName: string
  name: string
  defaultValue?: string
  flagsText: string
}

export interface RecognizedDeclarations {
  header?: HeaderMatch
  functions: DeclarationCandidate[]
  events: DeclarationCandidate[]
  properties: PropertyMatch[]
}

function countNewlines(text: string, from: number, to: number): number {
  let count = 0
  for (let i = from; i < to; i++) {
    if (text.charCodeAt(i) === 10) count++
  }
  return count
}

/**
 * Net count of open parentheses
 */
export function parenBalance(text: string): number {
  let depth = 0
  for (const char of text) {
    if (char === '(') depth++
    else if (char === ')') depth--
  }
  return depth
}

/**
 * First `Scriptname` line in the text
 */
export function findScriptHeader(text: string): HeaderMatch | undefined {
  const match = SCRIPT_HEADER.exec(text)
  if (!match) return undefined

  return {
    scriptName: match[1],
    extends: match[2] || undefined,
    flagsText: match[3].trim(),
    line: 1 + countNewlines(text, 0, match.index),
  }
}

/**
 * Collect declarations starting with `start`, reassembling a parameter
 * list that wraps onto following lines until its parentheses balance.
 */
export function collectDeclarations(text: string, start: RegExp, kind: DeclarationKind): DeclarationCandidate[] {
  const lines = text.split('\n')
  const candidates: DeclarationCandidate[] = []

  for (let i = 0; i < lines.length; i++) {
    const first = lines[i].trim()
    if (!start.test(first)) continue

    const line = i + 1
    let declaration = first
    while (i + 1 < lines.length && parenBalance(declaration) > 0) {
      i++
      declaration += ` ${lines[i].trim()}`
    }

    candidates.push({ kind, text: declaration, line })
  }

  return candidates
}

export function findFunctionDeclarations(text: string): DeclarationCandidate[] {
  return collectDeclarations(text, FUNCTION_START, 'function')
}

export function findEventDeclarations(text: string): DeclarationCandidate[] {
  return collectDeclarations(text, EVENT_START, 'event')
}

/**
 * Single-line property declarations in order of appearance
 */
export function findPropertyDeclarations(text: string): PropertyMatch[] {
  const properties: PropertyMatch[] = []
  // Line numbers are counted forward from the previous match
  let scanned = 0
  let line = 1

  for (const match of text.matchAll(PROPERTY_LINE)) {
    const index = match.index ?? 0
    line += countNewlines(text, scanned, index)
    scanned = index

    const defaultValue = match[3]?.trim()
    properties.push({
      kind: 'property',
      text: match[0].trim(),
      line,
      typeName: match[1],
      name: match[2],
      defaultValue: defaultValue || undefined,
      flagsText: match[4].trim(),
    })
  }

  return properties
}

export function recognizeDeclarations(text: string): RecognizedDeclarations {
  return {
    header: findScriptHeader(text),
    functions: findFunctionDeclarations(text),
    events: findEventDeclarations(text),
    properties: findPropertyDeclarations(text),
  }
}
