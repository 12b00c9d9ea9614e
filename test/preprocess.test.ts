import { describe, expect, it } from 'vitest'
import { preprocess } from '../src/parser'

describe('preprocess', () => {
  describe('line comments', () => {
    it('truncates each line at the first semicolon', () => {
      expect(preprocess('Scriptname Foo ; the quest script\nInt x = 5 ;note')).toBe('Scriptname Foo \nInt x = 5 ')
    })

    it('drops lines that are only a comment', () => {
      expect(preprocess('; header comment\nScriptname Foo')).toBe('Scriptname Foo')
    })

    it('drops blank and whitespace-only lines', () => {
      expect(preprocess('Scriptname Foo\n\n   \n\t\nEvent OnInit()')).toBe('Scriptname Foo\nEvent OnInit()')
    })

    it('splits CRLF line endings', () => {
      expect(preprocess('Scriptname Foo\r\nEvent OnInit()\r\n')).toBe('Scriptname Foo\nEvent OnInit()')
    })

    it('splits lone and doubled carriage returns', () => {
      expect(preprocess('a\r\r\nb')).toBe('a\nb')
      expect(preprocess('Scriptname Foo\rEvent OnInit()')).toBe('Scriptname Foo\nEvent OnInit()')
    })
  })

  describe('block comments', () => {
    it('removes exactly the commented lines between two declarations', () => {
      const text = [
        'Function A()',
        ';/ blah',
        ' more',
        '/;',
        'Function B()',
      ].join('\n')

      expect(preprocess(text)).toBe('Function A()\nFunction B()')
    })

    it('skips a line that opens and closes a block comment', () => {
      expect(preprocess('Function A()\nInt a ;/ inline /;\nFunction B()')).toBe('Function A()\nFunction B()')
    })

    it('drops everything after an unterminated block comment', () => {
      expect(preprocess('Function A()\n;/ never closed\nFunction B()')).toBe('Function A()')
    })
  })

  describe('line continuations', () => {
    it('folds a backslash-continued line into the next one', () => {
      const text = 'Function DoThing(int a, \\\n    int b) native'
      expect(preprocess(text)).toBe('Function DoThing(int a, int b) native')
    })

    it('folds several continued lines', () => {
      expect(preprocess('Function F(int a, \\\n int b, \\\n int c)')).toBe('Function F(int a, int b, int c)')
    })

    it('keeps a continuation left open at the end of input', () => {
      expect(preprocess('Scriptname Foo\nFunction F(int a, \\')).toBe('Scriptname Foo\nFunction F(int a,')
    })

    it('leaves continued lines alone when joining is disabled', () => {
      const text = 'Function F(int a, \\\nint b)'
      expect(preprocess(text, { joinContinuations: false })).toBe(text)
    })
  })

  it('is idempotent', () => {
    const inputs = [
      'Scriptname Foo ; comment\n\nInt Property X Auto',
      'Function A()\n;/ block\n/;\nFunction B() \\\n native',
      'a \\\n\\\nb',
      'trailing \\ \\',
      '   \n\t',
      'Event OnInit() ;/ odd /; \r\nEndEvent',
      'a\r\r\nb',
      '/ \r)\r\r\na;x\r\\',
      '\t/\r\r\nx/x\\\r\n;',
    ]

    for (const input of inputs) {
      const once = preprocess(input)
      expect(preprocess(once)).toBe(once)
    }
  })
})
