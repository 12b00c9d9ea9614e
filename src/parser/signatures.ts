import type { EventSignature, FunctionSignature, PropertySignature } from '../types'
import type { PropertyMatch } from './recognizer'

const FUNCTION_SHAPE = /^\s*(?:(\w+(?:\[\])?)\s+)?Function\s+(\w+)\s*\((.*)\)\s*([\w\s]*)$/is
// Trailing words after an event's parameter list are accepted and dropped
const EVENT_SHAPE = /^\s*Event\s+(\w+)\s*\((.*)\)[\w\s]*$/is

const NATIVE_MARKER = 'native'
const AUTO_MARKER = 'auto'
const GLOBAL_VARIABLE_TYPE = 'globalvariable'

/**
 * Split a parameter list on top-level commas.
 *
 * Commas inside parentheses or double-quoted strings do not split, so
 * `b As Float = foo(1,2)` stays one parameter.
 */
export function splitParameters(paramsText: string): string[] {
  const parts: string[] = []
  let depth = 0
  let inString = false
  let escaped = false
  let current = ''

  for (const char of paramsText) {
    if (inString) {
      if (escaped) escaped = false
      else if (char === '\\') escaped = true
      else if (char === '"') inString = false
    }
    else if (char === '"') {
      inString = true
    }
    else if (char === '(') {
      depth++
    }
    else if (char === ')') {
      depth = Math.max(0, depth - 1)
    }
    else if (char === ',' && depth === 0) {
      parts.push(current)
      current = ''
      continue
    }
    current += char
  }
  parts.push(current)

  return parts.map(part => part.trim()).filter(Boolean)
}

/**
 * Collapse whitespace in raw modifier text
 */
function normalizeFlags(flagsText: string): string {
  return flagsText.trim().split(/\s+/).filter(Boolean).join(' ')
}

/**
 * Unique tokens, compared case-insensitively; the first spelling is kept
 */
export function collectFlags(flagsText: string): Set<string> {
  const flags = new Set<string>()
  const seen = new Set<string>()

  for (const token of flagsText.split(/\s+/)) {
    const key = token.toLowerCase()
    if (!token || seen.has(key)) continue
    seen.add(key)
    flags.add(token)
  }

  return flags
}

/**
 * Structured signature of one reassembled `Function` declaration.
 *
 * Header stubs declare every function as externally defined, so `native`
 * is appended to the flags whenever the source did not carry it.
 */
export function extractFunction(declarationText: string): FunctionSignature | null {
  const match = FUNCTION_SHAPE.exec(declarationText)
  if (!match) return null

  let flags = normalizeFlags(match[4])
  if (!flags.toLowerCase().includes(NATIVE_MARKER)) {
    flags = flags ? `${flags} ${NATIVE_MARKER}` : NATIVE_MARKER
  }

  return {
    name: match[2],
    returnType: match[1] || undefined,
    parameters: splitParameters(match[3]),
    flags,
    isNative: flags.toLowerCase().includes(NATIVE_MARKER),
  }
}

export function extractEvent(declarationText: string): EventSignature | null {
  const match = EVENT_SHAPE.exec(declarationText)
  if (!match) return null

  return {
    name: match[1],
    parameters: splitParameters(match[2]),
  }
}

/**
 * Whether a property can be stubbed: a `GlobalVariable`, or an auto property.
 * Full properties need their accessor bodies and are left out.
 */
export function isStubbableProperty(typeName: string, flags: Iterable<string>): boolean {
  if (typeName.toLowerCase() === GLOBAL_VARIABLE_TYPE) return true
  for (const flag of flags) {
    if (flag.toLowerCase().includes(AUTO_MARKER)) return true
  }
  return false
}

/**
 * Property signature from a recognised property line, or `null` when the
 * property is not retained in a header
 */
export function extractProperty(match: PropertyMatch): PropertySignature | null {
  const flags = collectFlags(match.flagsText)
  if (!isStubbableProperty(match.typeName, flags)) return null

  return {
    name: match.name,
    typeName: match.typeName,
    defaultValue: match.defaultValue,
    flags,
  }
}
