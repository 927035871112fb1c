import { CH_CR, CH_NEWLINE, EOF, isNewline, isWhitespace } from './chars'
import { CharSource, Cursor } from './cursor'
import { RECOGNIZERS, RecognizerContext } from './recognizers'
import { LexDiagnostic, Token } from './token'

export interface ScanOptions {
  // Reject a reserved word followed by an identifier char (`iffy` stays one identifier).
  // Default: false.
  strictKeywords?: boolean
  // Count CR LF as one line break instead of two. Default: false.
  collapseCrlf?: boolean
}

/**
 * Receives tokens and diagnostics in input order.
 */
export interface TokenSink {
  token(token: Token): void
  diagnostic(diagnostic: LexDiagnostic): void
}

export interface ScanResult {
  tokens: Token[]
  diagnostics: LexDiagnostic[]
}

interface ScannerState {
  line: number
}

/**
 * Scanner for a C-like language.
 *
 * Alternates between skipping whitespace (which is the only place the line
 * counter advances) and dispatching to the recognizers in priority order.
 * A char no recognizer accepts is consumed and reported, so every run ends.
 */
export class Scanner {
  private cursor: Cursor
  private state: ScannerState
  private strictKeywords: boolean
  private collapseCrlf: boolean

  constructor(source: string | CharSource, options?: ScanOptions) {
    this.cursor = new Cursor(source)
    this.state = { line: 1 }
    this.strictKeywords = options?.strictKeywords ?? false
    this.collapseCrlf = options?.collapseCrlf ?? false
  }

  /**
   * Eagerly scan the entire source and collect tokens and diagnostics.
   */
  scan(): ScanResult {
    const tokens: Token[] = []
    const diagnostics: LexDiagnostic[] = []
    this.run({
      token: (t) => tokens.push(t),
      diagnostic: (d) => diagnostics.push(d),
    })
    return { tokens, diagnostics }
  }

  /**
   * Stream every token and diagnostic into `sink` until end of input.
   */
  run(sink: TokenSink): void {
    for (;;) {
      this.skipWhitespace()
      if (this.cursor.peek() === EOF) return

      const token = this.dispatch()
      if (token !== null) {
        sink.token(token)
      } else {
        sink.diagnostic(this.skipUnrecognized())
      }
    }
  }

  /**
   * Try each recognizer in order and return the first committed token,
   * or null when none matches at the current position.
   */
  dispatch(): Token | null {
    const ctx: RecognizerContext = {
      line: this.state.line,
      strictKeywords: this.strictKeywords,
      collapseCrlf: this.collapseCrlf,
    }
    for (const recognizer of RECOGNIZERS) {
      const token = recognizer.recognize(this.cursor, ctx)
      if (token !== null) {
        return token
      }
    }
    return null
  }

  // --- Whitespace and line counting ---
  private skipWhitespace(): void {
    let prev = EOF
    while (isWhitespace(this.cursor.peek())) {
      const c = this.cursor.read()
      const crlfTail = this.collapseCrlf && prev === CH_CR && c === CH_NEWLINE
      if (isNewline(c) && !crlfTail) {
        this.state.line++
      }
      prev = c
    }
  }

  private skipUnrecognized(): LexDiagnostic {
    const offset = this.cursor.offset
    const c = this.cursor.read()
    return {
      line: this.state.line,
      offset,
      char: String.fromCharCode(c),
      message: 'unrecognized character',
    }
  }
}
