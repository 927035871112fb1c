// Character code constants
export const CH_0 = 0x30 // '0'
export const CH_7 = 0x37 // '7'
export const CH_9 = 0x39 // '9'
export const CH_A = 0x41 // 'A'
export const CH_E = 0x45
export const CH_F = 0x46
export const CH_X = 0x58
export const CH_Z = 0x5a
export const CH_a = 0x61 // 'a'
export const CH_b = 0x62
export const CH_e = 0x65
export const CH_f = 0x66
export const CH_n = 0x6e
export const CH_r = 0x72
export const CH_t = 0x74
export const CH_v = 0x76
export const CH_x = 0x78
export const CH_z = 0x7a
export const CH_DQUOTE = 0x22 // '"'
export const CH_SQUOTE = 0x27 // "'"
export const CH_BSLASH = 0x5c // '\'
export const CH_UNDERSCORE = 0x5f // '_'
export const CH_DOT = 0x2e // '.'
export const CH_HASH = 0x23 // '#'
export const CH_SLASH = 0x2f // '/'
export const CH_STAR = 0x2a // '*'
export const CH_NEWLINE = 0x0a // '\n'
export const CH_CR = 0x0d // '\r'
export const CH_TAB = 0x09
export const CH_SPACE = 0x20 // ' '
export const CH_PLUS = 0x2b
export const CH_MINUS = 0x2d
export const CH_LESS = 0x3c
export const CH_GREATER = 0x3e

/** Sentinel returned by the cursor at end of input. Never a valid char code. */
export const EOF = -1

export function isNewline(c: number): boolean {
  return c === CH_CR || c === CH_NEWLINE
}

export function isWhitespace(c: number): boolean {
  return c === CH_SPACE || c === CH_TAB || isNewline(c)
}

export function isAlpha(c: number): boolean {
  return (c >= CH_a && c <= CH_z) || (c >= CH_A && c <= CH_Z)
}

export function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

export function isUnderscore(c: number): boolean {
  return c === CH_UNDERSCORE
}

export function isHexDigit(c: number): boolean {
  return isDigit(c) || (c >= CH_a && c <= CH_f) || (c >= CH_A && c <= CH_F)
}

export function isOctalDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_7
}

export function isIdentStart(c: number): boolean {
  return isAlpha(c) || isUnderscore(c)
}

export function isIdentContinue(c: number): boolean {
  return isAlpha(c) || isUnderscore(c) || isDigit(c)
}

/**
 * Number of line breaks in `text`. CR and LF each count once, except that an
 * LF right after a CR is skipped when `collapseCrlf` is set.
 */
export function countLineBreaks(text: string, collapseCrlf: boolean): number {
  let breaks = 0
  let prev = EOF
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i)
    if (isNewline(c) && !(collapseCrlf && prev === CH_CR && c === CH_NEWLINE)) {
      breaks++
    }
    prev = c
  }
  return breaks
}

/**
 * Decode the character following a backslash.
 * Unknown escapes decode to the character itself.
 */
export function decodeEscape(c: number): number {
  switch (c) {
    case CH_a:
      return 0x07 // bell
    case CH_b:
      return 0x08 // backspace
    case CH_e:
      return 0x1b // ESC (GNU extension)
    case CH_f:
      return 0x0c // form feed
    case CH_n:
      return 0x0a
    case CH_r:
      return 0x0d
    case CH_t:
      return 0x09
    case CH_v:
      return 0x0b // vertical tab
    default:
      // \\ \' \" \? and anything unknown
      return c
  }
}
