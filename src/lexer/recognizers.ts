import {
  CH_0,
  CH_BSLASH,
  CH_DOT,
  CH_DQUOTE,
  CH_E,
  CH_GREATER,
  CH_HASH,
  CH_LESS,
  CH_MINUS,
  CH_PLUS,
  CH_SLASH,
  CH_SQUOTE,
  CH_STAR,
  CH_X,
  CH_e,
  CH_x,
  EOF,
  countLineBreaks,
  decodeEscape,
  isDigit,
  isHexDigit,
  isIdentContinue,
  isIdentStart,
  isNewline,
  isOctalDigit,
  isWhitespace,
} from './chars'
import { Cursor } from './cursor'
import { OPERATORS, RESERVED_WORDS, SPECIAL_SYMBOLS, Token, TokenClass } from './token'

/**
 * Per-attempt state handed to every recognizer.
 */
export interface RecognizerContext {
  // Line counter value when recognition started
  readonly line: number
  // Require a non-identifier char after a reserved word
  readonly strictKeywords: boolean
  // Count CR LF as one line break when computing a token's end line
  readonly collapseCrlf: boolean
}

/**
 * A single recognition rule. `recognize` either commits a token, leaving the
 * cursor right after the lexeme, or returns null with the cursor exactly where
 * it was on entry.
 */
export interface Recognizer {
  readonly name: string
  readonly tokenClass: TokenClass
  recognize(cursor: Cursor, ctx: RecognizerContext): Token | null
}

const char = String.fromCharCode

// `start` comes from cursor.mark(), so sinceMark() is the whole lexeme.
function makeToken(
  cursor: Cursor,
  ctx: RecognizerContext,
  tokenClass: TokenClass,
  text: string,
  start: number,
  error?: string,
): Token {
  const line = ctx.line
  const endLine = line + countLineBreaks(cursor.sinceMark(), ctx.collapseCrlf)
  if (error !== undefined) {
    return { line, endLine, tokenClass, text, start, end: cursor.offset, error }
  }
  return { line, endLine, tokenClass, text, start, end: cursor.offset }
}

function readWhile(cursor: Cursor, pred: (c: number) => boolean): string {
  let s = ''
  for (let c = cursor.peek(); c !== EOF && pred(c); c = cursor.peek()) {
    s += char(cursor.read())
  }
  return s
}

/** Consume `literal` if the input starts with it; otherwise leave the cursor alone. */
function matchLiteral(cursor: Cursor, literal: string): boolean {
  const read = cursor.readString(literal.length)
  if (read === literal) return true
  cursor.unread(read)
  return false
}

// --- Comments ---
function recognizeSingleLineComment(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  if (!matchLiteral(cursor, '//')) return null
  const content = readWhile(cursor, (c) => !isNewline(c))
  return makeToken(cursor, ctx, TokenClass.SingleLineComment, content, start)
}

function recognizeMultiLineComment(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  if (!matchLiteral(cursor, '/*')) return null
  let body = ''
  let prev = EOF
  for (;;) {
    const c = cursor.read()
    if (c === EOF) {
      return makeToken(cursor, ctx, TokenClass.MultiLineComment, body, start, 'missing */')
    }
    if (prev === CH_STAR && c === CH_SLASH) {
      return makeToken(cursor, ctx, TokenClass.MultiLineComment, body.slice(0, -1), start)
    }
    body += char(c)
    prev = c
  }
}

// --- Preprocessor ---
// Only `#include` is a directive. Anything after a matched `include` that goes
// wrong still commits the token, annotated with the problem.
function recognizePreprocessor(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  if (cursor.peek() !== CH_HASH) return null
  let lexeme = char(cursor.read())
  lexeme += readWhile(cursor, isWhitespace)

  const word = cursor.readString('include'.length)
  if (word !== 'include') {
    cursor.unread(lexeme + word)
    return null
  }
  lexeme += word

  if (isIdentContinue(cursor.peek())) {
    lexeme += readWhile(cursor, isIdentContinue)
    return makeToken(cursor, ctx, TokenClass.Preprocessor, lexeme, start, 'unknown directive')
  }

  lexeme += readWhile(cursor, isWhitespace)
  const open = cursor.peek()
  let close: number
  if (open === CH_LESS) {
    close = CH_GREATER
  } else if (open === CH_DQUOTE) {
    close = CH_DQUOTE
  } else {
    return makeToken(
      cursor,
      ctx,
      TokenClass.Preprocessor,
      lexeme,
      start,
      'expected < or " after include',
    )
  }
  lexeme += char(cursor.read())

  for (;;) {
    const c = cursor.peek()
    if (c === EOF || isNewline(c)) {
      return makeToken(
        cursor,
        ctx,
        TokenClass.Preprocessor,
        lexeme,
        start,
        `missing closing ${char(close)}`,
      )
    }
    lexeme += char(cursor.read())
    if (c === close) {
      return makeToken(cursor, ctx, TokenClass.Preprocessor, lexeme, start)
    }
  }
}

// --- Special symbols, reserved words, operators ---
function recognizeSpecialSymbol(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  const c = cursor.peek()
  if (c === EOF || !SPECIAL_SYMBOLS.includes(char(c))) return null
  const text = char(cursor.read())
  return makeToken(cursor, ctx, TokenClass.SpecialSymbol, text, start)
}

// Each keyword is tried by reading exactly its length. Without strictKeywords
// nothing checks the following char, so `iffy` yields `if` and leaves `fy`.
function recognizeReservedWord(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  for (const word of RESERVED_WORDS) {
    const read = cursor.readString(word.length)
    if (read === word && !(ctx.strictKeywords && isIdentContinue(cursor.peek()))) {
      return makeToken(cursor, ctx, TokenClass.ReservedWord, word, start)
    }
    cursor.unread(read)
  }
  return null
}

function recognizeOperator(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  for (const op of OPERATORS) {
    if (matchLiteral(cursor, op)) {
      return makeToken(cursor, ctx, TokenClass.Operator, op, start)
    }
  }
  return null
}

// --- Char and string literals ---
function recognizeQuoted(
  cursor: Cursor,
  ctx: RecognizerContext,
  quote: number,
  tokenClass: TokenClass,
): Token | null {
  const start = cursor.mark()
  if (cursor.peek() !== quote) return null
  cursor.read() // skip opening quote

  let content = ''
  for (;;) {
    const c = cursor.peek()
    // The newline is left for the driver loop so it still counts the line.
    if (c === EOF || isNewline(c)) {
      return makeToken(cursor, ctx, tokenClass, content, start, `missing closing ${char(quote)}`)
    }
    cursor.read()
    if (c === quote) break
    if (c !== CH_BSLASH) {
      content += char(c)
      continue
    }

    const next = cursor.peek()
    if (next === EOF) continue
    cursor.read()
    if (isNewline(next)) {
      // Line continuation
      readWhile(cursor, isWhitespace)
    } else {
      content += char(decodeEscape(next))
    }
  }

  if (tokenClass === TokenClass.CharLiteral && content.length === 0) {
    return makeToken(cursor, ctx, tokenClass, content, start, 'empty character constant')
  }
  return makeToken(cursor, ctx, tokenClass, content, start)
}

function recognizeCharLiteral(cursor: Cursor, ctx: RecognizerContext): Token | null {
  return recognizeQuoted(cursor, ctx, CH_SQUOTE, TokenClass.CharLiteral)
}

function recognizeStringLiteral(cursor: Cursor, ctx: RecognizerContext): Token | null {
  return recognizeQuoted(cursor, ctx, CH_DQUOTE, TokenClass.StringLiteral)
}

// --- Numbers ---

/** Optional exponent suffix. A marker with no digits after it is pushed back. */
function readExponent(cursor: Cursor): string {
  const marker = cursor.peek()
  if (marker !== CH_e && marker !== CH_E) return ''
  let exp = char(cursor.read())
  const sign = cursor.peek()
  if (sign === CH_PLUS || sign === CH_MINUS) {
    exp += char(cursor.read())
  }
  const digits = readWhile(cursor, isDigit)
  if (digits.length === 0) {
    cursor.unread(exp)
    return ''
  }
  return exp + digits
}

// [+-]? ( D+ '.' D* | D* '.' D+ ) ( [eE] [+-]? D+ )?
function recognizeFloat(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  let lexeme = ''
  const sign = cursor.peek()
  if (sign === CH_PLUS || sign === CH_MINUS) {
    lexeme += char(cursor.read())
  }

  const intPart = readWhile(cursor, isDigit)
  lexeme += intPart
  if (cursor.peek() !== CH_DOT) {
    cursor.unread(lexeme)
    return null
  }
  lexeme += char(cursor.read())

  const fracPart = readWhile(cursor, isDigit)
  lexeme += fracPart
  if (intPart.length === 0 && fracPart.length === 0) {
    cursor.unread(lexeme)
    return null
  }

  lexeme += readExponent(cursor)
  return makeToken(cursor, ctx, TokenClass.Float, lexeme, start)
}

function recognizeIdentifier(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  if (!isIdentStart(cursor.peek())) return null
  const text = readWhile(cursor, isIdentContinue)
  return makeToken(cursor, ctx, TokenClass.Identifier, text, start)
}

// 0 | 0[xX]H+ | 0[0-7]+ | [1-9][0-9]*
function recognizeInteger(cursor: Cursor, ctx: RecognizerContext): Token | null {
  const start = cursor.mark()
  const first = cursor.peek()
  if (!isDigit(first)) return null
  let lexeme = char(cursor.read())

  if (first !== CH_0) {
    lexeme += readWhile(cursor, isDigit)
    return makeToken(cursor, ctx, TokenClass.Integer, lexeme, start)
  }

  const x = cursor.peek()
  if (x === CH_x || x === CH_X) {
    cursor.read()
    const hex = readWhile(cursor, isHexDigit)
    if (hex.length === 0) {
      // `0x` with no digits: commit `0`, leave the `x` for the next token
      cursor.unread(char(x))
      return makeToken(cursor, ctx, TokenClass.Integer, lexeme, start)
    }
    return makeToken(cursor, ctx, TokenClass.Integer, lexeme + char(x) + hex, start)
  }

  lexeme += readWhile(cursor, isOctalDigit)
  return makeToken(cursor, ctx, TokenClass.Integer, lexeme, start)
}

/**
 * Recognizers in dispatch order. The order resolves overlaps between classes:
 * comments and directives before the `/` and `#` operators, reserved words
 * before identifiers, floats before integers.
 */
export const RECOGNIZERS: readonly Recognizer[] = [
  {
    name: 'single-line comment',
    tokenClass: TokenClass.SingleLineComment,
    recognize: recognizeSingleLineComment,
  },
  {
    name: 'multi-line comment',
    tokenClass: TokenClass.MultiLineComment,
    recognize: recognizeMultiLineComment,
  },
  { name: 'preprocessor', tokenClass: TokenClass.Preprocessor, recognize: recognizePreprocessor },
  {
    name: 'special symbol',
    tokenClass: TokenClass.SpecialSymbol,
    recognize: recognizeSpecialSymbol,
  },
  { name: 'reserved word', tokenClass: TokenClass.ReservedWord, recognize: recognizeReservedWord },
  { name: 'char literal', tokenClass: TokenClass.CharLiteral, recognize: recognizeCharLiteral },
  {
    name: 'string literal',
    tokenClass: TokenClass.StringLiteral,
    recognize: recognizeStringLiteral,
  },
  { name: 'float', tokenClass: TokenClass.Float, recognize: recognizeFloat },
  { name: 'operator', tokenClass: TokenClass.Operator, recognize: recognizeOperator },
  { name: 'identifier', tokenClass: TokenClass.Identifier, recognize: recognizeIdentifier },
  { name: 'integer', tokenClass: TokenClass.Integer, recognize: recognizeInteger },
]

export function findRecognizer(tokenClass: TokenClass): Recognizer | undefined {
  return RECOGNIZERS.find((r) => r.tokenClass === tokenClass)
}
