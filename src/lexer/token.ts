/**
 * Lexical class of a token. `tokenClassLabel` gives its output label.
 */
export const enum TokenClass {
  Identifier = 0,
  ReservedWord = 1,
  Integer = 2,
  Float = 3,
  CharLiteral = 4,
  StringLiteral = 5,
  Operator = 6,
  SpecialSymbol = 7,
  SingleLineComment = 8,
  MultiLineComment = 9,
  Preprocessor = 10,
}

/**
 * A committed token.
 * `text` is the payload: comment content without delimiters, decoded literal
 * content for chars and strings, and the lexeme itself for everything else.
 * `start`/`end` are offsets of the consumed span in the input.
 * `line` is the line counter when the token started; `endLine` adds the line
 * breaks consumed inside the token, which the counter itself never sees.
 */
export interface Token {
  readonly line: number
  readonly endLine: number
  readonly tokenClass: TokenClass
  readonly text: string
  readonly start: number
  readonly end: number
  readonly error?: string
}

/**
 * A character that no recognizer accepted. The scanner consumes it and moves on.
 */
export interface LexDiagnostic {
  readonly line: number
  readonly offset: number
  readonly char: string
  readonly message: string
}

const LABELS: Record<TokenClass, string> = {
  [TokenClass.Identifier]: 'IDEN',
  [TokenClass.ReservedWord]: 'REWD',
  [TokenClass.Integer]: 'INTE',
  [TokenClass.Float]: 'FLOT',
  [TokenClass.CharLiteral]: 'CHAR',
  [TokenClass.StringLiteral]: 'STR',
  [TokenClass.Operator]: 'OPER',
  [TokenClass.SpecialSymbol]: 'SPEC',
  [TokenClass.SingleLineComment]: 'SC',
  [TokenClass.MultiLineComment]: 'MC',
  [TokenClass.Preprocessor]: 'PREP',
}

export function tokenClassLabel(tokenClass: TokenClass): string {
  return LABELS[tokenClass]
}

// Tried in this order; the order matters because there is no boundary check
// by default ("do" is tried before "double").
export const RESERVED_WORDS: readonly string[] = [
  'if',
  'else',
  'while',
  'for',
  'do',
  'switch',
  'case',
  'default',
  'continue',
  'int',
  'float',
  'double',
  'char',
  'break',
  'static',
  'extern',
  'auto',
  'register',
  'sizeof',
  'union',
  'struct',
  'enum',
  'return',
  'goto',
  'const',
]

// Two-character operators come first so they win over their one-character prefixes.
export const OPERATORS: readonly string[] = [
  '>>',
  '<<',
  '++',
  '--',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '&&',
  '||',
  '->',
  '==',
  '>=',
  '<=',
  '!=',
  '+',
  '-',
  '*',
  '/',
  '=',
  ',',
  '%',
  '!',
  '&',
  '[',
  ']',
  '|',
  '^',
  '.',
  '>',
  '<',
  ':',
  '?',
]

export const SPECIAL_SYMBOLS: readonly string[] = ['{', '}', '(', ')', ';']
