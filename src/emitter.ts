import type { EventSignature, FunctionSignature, PropertySignature, SourceUnit } from './types'

export function formatScriptLine(unit: SourceUnit): string {
  let line = `Scriptname ${unit.scriptName}`
  if (unit.extends) {
    line += ` extends ${unit.extends}`
  }
  if (unit.scriptFlags.size > 0) {
    line += ` ${[...unit.scriptFlags].join(' ')}`
  }
  return line
}

export function formatProperty(property: PropertySignature): string {
  let line = `${property.typeName} Property ${property.name}`
  if (property.defaultValue !== undefined) {
    line += ` = ${property.defaultValue}`
  }
  if (property.flags.size > 0) {
    line += ` ${[...property.flags].join(' ')}`
  }
  return line
}

export function formatFunction(fn: FunctionSignature): string {
  const returnType = fn.returnType ? `${fn.returnType} ` : ''
  const flags = fn.flags ? ` ${fn.flags}` : ''
  return `${returnType}Function ${fn.name}(${fn.parameters.join(', ')})${flags}`
}

export function formatEvent(event: EventSignature): string {
  return `Event ${event.name}(${event.parameters.join(', ')})`
}

/**
 * Render a SourceUnit as header stub text.
 *
 * Layout: script line, blank line, properties followed by a blank line,
 * functions, then events (separated from functions by one blank line).
 * Empty sections produce nothing.
 */
export function renderHeader(unit: SourceUnit): string {
  const lines: string[] = [formatScriptLine(unit), '']

  if (unit.properties.length > 0) {
    lines.push(...unit.properties.map(formatProperty))
    lines.push('')
  }

  lines.push(...unit.functions.map(formatFunction))

  if (unit.events.length > 0) {
    if (unit.functions.length > 0) {
      lines.push('')
    }
    lines.push(...unit.events.map(formatEvent))
  }

  return `${lines.join('\n')}\n`
}

/**
 * Output file name of a script's header
 */
export function headerFileName(unit: SourceUnit): string {
  return `${unit.scriptName}.psc`
}
