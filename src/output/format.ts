import { TokenSink } from '../lexer/scanner'
import { LexDiagnostic, Token, TokenClass, tokenClassLabel } from '../lexer/token'

/**
 * `plain`:   `<LABEL>: <payload>`
 * `tabular`: `<line>\t<LABEL>\t<payload>`, with `<line>-<endLine>` for tokens
 *            that span lines
 */
export type OutputFormat = 'plain' | 'tabular'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['plain', 'tabular']

const CONTROL_ESCAPES = new Map<number, string>([
  [0x07, '\\a'],
  [0x08, '\\b'],
  [0x09, '\\t'],
  [0x0a, '\\n'],
  [0x0b, '\\v'],
  [0x0c, '\\f'],
  [0x0d, '\\r'],
  [0x1b, '\\e'],
])

/**
 * Render control characters as C escapes so a payload always fits on one line.
 */
export function escapeControl(text: string): string {
  let out = ''
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i)
    if (c < 0x20 || c === 0x7f) {
      out += CONTROL_ESCAPES.get(c) ?? '\\x' + c.toString(16).padStart(2, '0')
    } else {
      out += text[i]
    }
  }
  return out
}

export function tokenPayload(token: Token): string {
  // Multi-line comments are reported without their body
  const text = token.tokenClass === TokenClass.MultiLineComment ? '' : escapeControl(token.text)
  if (token.error === undefined) return text
  return text.length > 0 ? `${text} ERROR: ${token.error}` : `ERROR: ${token.error}`
}

export function formatToken(token: Token, format: OutputFormat = 'plain'): string {
  const label = tokenClassLabel(token.tokenClass)
  const payload = tokenPayload(token)
  if (format === 'tabular') {
    const lines = token.endLine === token.line ? `${token.line}` : `${token.line}-${token.endLine}`
    return payload.length > 0 ? `${lines}\t${label}\t${payload}` : `${lines}\t${label}`
  }
  return `${label}: ${payload}`
}

export function formatDiagnostic(diagnostic: LexDiagnostic, format: OutputFormat = 'plain'): string {
  const what = `${diagnostic.message} '${escapeControl(diagnostic.char)}'`
  if (format === 'tabular') {
    return `${diagnostic.line}\tERROR\t${what}`
  }
  return `ERROR: ${what} on line ${diagnostic.line}`
}

/**
 * Sink that renders every token and diagnostic as one output line.
 */
export class LineSink implements TokenSink {
  readonly lines: string[] = []
  tokenCount = 0
  diagnosticCount = 0

  constructor(private readonly format: OutputFormat = 'plain') {}

  token(token: Token): void {
    this.tokenCount++
    this.lines.push(formatToken(token, this.format))
  }

  diagnostic(diagnostic: LexDiagnostic): void {
    this.diagnosticCount++
    this.lines.push(formatDiagnostic(diagnostic, this.format))
  }

  /** All lines, each terminated by `\n`. */
  toString(): string {
    return this.lines.map((line) => line + '\n').join('')
  }
}
