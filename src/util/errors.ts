/**
 * Reading the input or writing the output failed. Fatal for the CLI,
 * never raised by the scanner itself.
 */
export class ScanIoError extends Error {
  constructor(
    readonly path: string,
    readonly operation: 'read' | 'write',
    cause: unknown,
  ) {
    super(`cannot ${operation} ${path}: ${describeError(cause)}`, { cause })
    this.name = 'ScanIoError'
  }
}

/** Bad command line arguments. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
