import type { SourceUnit } from '../src/types'
import { describe, expect, it } from 'vitest'
import { formatFunction, formatProperty, formatScriptLine, headerFileName, renderHeader } from '../src/emitter'
import { parse } from '../src/parser'

function unit(overrides: Partial<SourceUnit> = {}): SourceUnit {
  return {
    scriptName: 'MyQuest',
    scriptFlags: new Set(),
    functions: [],
    events: [],
    properties: [],
    ...overrides,
  }
}

describe('line formatting', () => {
  it('formats the script line', () => {
    expect(formatScriptLine(unit())).toBe('Scriptname MyQuest')
    expect(formatScriptLine(unit({ extends: 'Quest', scriptFlags: new Set(['Hidden', 'Conditional']) })))
      .toBe('Scriptname MyQuest extends Quest Hidden Conditional')
  })

  it('formats properties with defaults and flags', () => {
    expect(formatProperty({ name: 'Count', typeName: 'Int', defaultValue: '5', flags: new Set(['AutoReadOnly']) }))
      .toBe('Int Property Count = 5 AutoReadOnly')
    expect(formatProperty({ name: 'GameHour', typeName: 'GlobalVariable', flags: new Set() }))
      .toBe('GlobalVariable Property GameHour')
  })

  it('formats functions', () => {
    expect(formatFunction({ name: 'Reset', parameters: [], flags: 'native', isNative: true }))
      .toBe('Function Reset() native')
    expect(formatFunction({ name: 'Add', returnType: 'Int', parameters: ['Int a', 'Int b = 1'], flags: 'global native', isNative: true }))
      .toBe('Int Function Add(Int a, Int b = 1) global native')
  })
})

describe('renderHeader', () => {
  it('lays out every section', () => {
    const header = renderHeader(unit({
      extends: 'Quest',
      scriptFlags: new Set(['Conditional']),
      properties: [{ name: 'Count', typeName: 'Int', defaultValue: '5', flags: new Set(['Auto']) }],
      functions: [
        { name: 'GetCount', returnType: 'Int', parameters: [], flags: 'global native', isNative: true },
        { name: 'Reset', parameters: ['Int aiValue = 0'], flags: 'native', isNative: true },
      ],
      events: [{ name: 'OnInit', parameters: [] }],
    }))

    expect(header).toBe([
      'Scriptname MyQuest extends Quest Conditional',
      '',
      'Int Property Count = 5 Auto',
      '',
      'Int Function GetCount() global native',
      'Function Reset(Int aiValue = 0) native',
      '',
      'Event OnInit()',
      '',
    ].join('\n'))
  })

  it('emits no separator for empty sections', () => {
    expect(renderHeader(unit({ functions: [{ name: 'F', parameters: [], flags: 'native', isNative: true }] })))
      .toBe('Scriptname MyQuest\n\nFunction F() native\n')
    expect(renderHeader(unit({ events: [{ name: 'OnInit', parameters: [] }] })))
      .toBe('Scriptname MyQuest\n\nEvent OnInit()\n')
    expect(renderHeader(unit({ properties: [{ name: 'X', typeName: 'Int', flags: new Set(['Auto']) }] })))
      .toBe('Scriptname MyQuest\n\nInt Property X Auto\n\n')
    expect(renderHeader(unit())).toBe('Scriptname MyQuest\n\n')
  })

  it('renders a parsed script', () => {
    const source = [
      'Scriptname DoorScript extends ObjectReference Hidden',
      '',
      'Int Property OpenCount = 0 Auto ; times opened',
      'Bool Property Locked',
      '  Bool Function Get()',
      '    return false',
      '  EndFunction',
      'EndProperty',
      '',
      'Function Open(Actor akOpener, \\',
      '              Bool abForce = false)',
      '  OpenCount += 1',
      'EndFunction',
      '',
      'Event OnActivate(ObjectReference akActionRef)',
      '  Open(akActionRef as Actor)',
      'EndEvent',
    ].join('\n')

    expect(renderHeader(parse(source))).toBe([
      'Scriptname DoorScript extends ObjectReference Hidden',
      '',
      'Int Property OpenCount = 0 Auto',
      '',
      'Bool Function Get() native',
      'Function Open(Actor akOpener, Bool abForce = false) native',
      '',
      'Event OnActivate(ObjectReference akActionRef)',
      '',
    ].join('\n'))
  })

  it('names the header after the script', () => {
    expect(headerFileName(unit({ scriptName: 'DoorScript' }))).toBe('DoorScript.psc')
  })
})
