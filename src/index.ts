// Public API for the token scanner.
// Usage: import { scan } from 'c-token-scanner';

import { ScanOptions, ScanResult, Scanner } from './lexer/scanner'
import { LineSink, OutputFormat } from './output/format'

export interface ScanToLinesOptions extends ScanOptions {
  format?: OutputFormat
}

export function scan(source: string, options?: ScanOptions): ScanResult {
  return new Scanner(source, options).scan()
}

/**
 * Scan `source` and render each token and diagnostic as an output line.
 */
export function scanToLines(source: string, options?: ScanToLinesOptions): string[] {
  const sink = new LineSink(options?.format ?? 'plain')
  new Scanner(source, options).run(sink)
  return sink.lines
}

// Re-export types for consumers
export type { TokenClass, Token, LexDiagnostic } from './lexer/token'
export { tokenClassLabel, RESERVED_WORDS, OPERATORS, SPECIAL_SYMBOLS } from './lexer/token'
export type { ScanOptions, ScanResult, TokenSink } from './lexer/scanner'
export { Scanner } from './lexer/scanner'
export type { CharSource } from './lexer/cursor'
export { Cursor, StringSource } from './lexer/cursor'
export { RECOGNIZERS, findRecognizer } from './lexer/recognizers'
export type { Recognizer, RecognizerContext } from './lexer/recognizers'
export { decodeEscape, EOF } from './lexer/chars'
export type { OutputFormat } from './output/format'
export { formatToken, formatDiagnostic, escapeControl, LineSink } from './output/format'
export { ScanIoError, CliUsageError } from './util/errors'
