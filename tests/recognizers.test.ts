import { Cursor } from '../src/lexer/cursor'
import { RECOGNIZERS, RecognizerContext, findRecognizer } from '../src/lexer/recognizers'
import { TokenClass } from '../src/lexer/token'

const ctx: RecognizerContext = { line: 7, strictKeywords: false, collapseCrlf: false }

function recognizer(tokenClass: TokenClass) {
  const found = findRecognizer(tokenClass)
  if (found === undefined) throw new Error(`no recognizer for ${tokenClass}`)
  return found
}

describe('recognizers', () => {
  it('are tried in dispatch order', () => {
    expect(RECOGNIZERS.map((r) => r.name)).toEqual([
      'single-line comment',
      'multi-line comment',
      'preprocessor',
      'special symbol',
      'reserved word',
      'char literal',
      'string literal',
      'float',
      'operator',
      'identifier',
      'integer',
    ])
  })

  describe('on no match', () => {
    for (const r of RECOGNIZERS) {
      it(`${r.name} leaves the cursor where it was`, () => {
        const cursor = new Cursor('@abc')
        expect(r.recognize(cursor, ctx)).toBeNull()
        expect(cursor.offset).toBe(0)
        expect(r.recognize(cursor, ctx)).toBeNull()
        expect(cursor.readString(10)).toBe('@abc')
      })
    }

    it('restores a partially matched include', () => {
      const cursor = new Cursor('#  inclu')
      expect(recognizer(TokenClass.Preprocessor).recognize(cursor, ctx)).toBeNull()
      expect(cursor.readString(10)).toBe('#  inclu')
    })

    it('restores a digit run with no decimal point', () => {
      const cursor = new Cursor('-123abc')
      expect(recognizer(TokenClass.Float).recognize(cursor, ctx)).toBeNull()
      expect(cursor.offset).toBe(0)
      expect(cursor.readString(10)).toBe('-123abc')
    })

    it('restores a word that is not a keyword', () => {
      const cursor = new Cursor('whilst')
      expect(recognizer(TokenClass.ReservedWord).recognize(cursor, ctx)).toBeNull()
      expect(cursor.readString(10)).toBe('whilst')
    })
  })

  describe('on a match', () => {
    it('stops right after the lexeme and tags the context line', () => {
      const cursor = new Cursor('while(x)')
      const token = recognizer(TokenClass.ReservedWord).recognize(cursor, ctx)
      expect(token).toEqual({
        line: 7,
        endLine: 7,
        tokenClass: TokenClass.ReservedWord,
        text: 'while',
        start: 0,
        end: 5,
      })
      expect(cursor.readString(1)).toBe('(')
    })

    it('leaves the newline after a single-line comment', () => {
      const cursor = new Cursor('// note\r\nx')
      const token = recognizer(TokenClass.SingleLineComment).recognize(cursor, ctx)
      expect(token?.text).toBe(' note')
      expect(cursor.read()).toBe(0x0d)
    })

    it('pushes back the exponent sign along with the marker', () => {
      const cursor = new Cursor('2.5e-x')
      const token = recognizer(TokenClass.Float).recognize(cursor, ctx)
      expect(token?.text).toBe('2.5')
      expect(cursor.readString(3)).toBe('e-x')
    })

    it('counts line breaks inside the lexeme into the end line', () => {
      const comment = recognizer(TokenClass.MultiLineComment)
      expect(comment.recognize(new Cursor('/* a\r\nb\n */'), ctx)?.endLine).toBe(10)
      const collapsed: RecognizerContext = { ...ctx, collapseCrlf: true }
      expect(comment.recognize(new Cursor('/* a\r\nb\n */'), collapsed)?.endLine).toBe(9)
    })

    it('drops pushed-back chars from the recorded lexeme', () => {
      const cursor = new Cursor('#\n\nifdef X')
      expect(recognizer(TokenClass.Preprocessor).recognize(cursor, ctx)).toBeNull()
      expect(cursor.sinceMark()).toBe('')
      expect(cursor.offset).toBe(0)
    })

    it('rejects a keyword followed by an identifier char when strict', () => {
      const cursor = new Cursor('format')
      const strict: RecognizerContext = { line: 1, strictKeywords: true, collapseCrlf: false }
      expect(recognizer(TokenClass.ReservedWord).recognize(cursor, strict)).toBeNull()
      expect(recognizer(TokenClass.ReservedWord).recognize(cursor, ctx)?.text).toBe('for')
    })
  })
})
