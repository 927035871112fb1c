import { readFile, writeFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import { ScanOptions, Scanner } from './lexer/scanner'
import { LineSink, OUTPUT_FORMATS, OutputFormat, formatDiagnostic } from './output/format'
import { CliUsageError, ScanIoError, describeError } from './util/errors'
import { LogLevel, Logger, createLogger, parseLogLevel } from './util/logger'

const log = createLogger('c-scanner')

export const DEFAULT_OUTPUT = 'output.txt'

export const USAGE = `usage: c-scanner <input> [output] [options]

Writes one line per token to [output] (default: ${DEFAULT_OUTPUT}).

options:
  --strict-keywords   do not split identifiers that start with a reserved word
  --collapse-crlf     count CR LF as a single line break
  --format <name>     plain (default) or tabular
  --verbose           log debug output
  --quiet             log errors only
  -h, --help          show this message`

export interface CliOptions {
  input?: string
  output: string
  format: OutputFormat
  scan: ScanOptions
  logLevel?: LogLevel
  help: boolean
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value)
}

/**
 * Turn command line arguments (without the node and script paths) into options.
 * Throws CliUsageError on unknown flags, extra positionals or a bad format.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parseArgsStrict>
  try {
    parsed = parseArgsStrict(argv)
  } catch (err) {
    throw new CliUsageError(describeError(err))
  }
  const { values, positionals } = parsed

  if (positionals.length > 2) {
    throw new CliUsageError(`unexpected argument: ${positionals[2]}`)
  }
  const format = values.format ?? 'plain'
  if (!isOutputFormat(format)) {
    throw new CliUsageError(`unknown format: ${format}`)
  }

  let logLevel: LogLevel | undefined
  if (values.verbose) {
    logLevel = LogLevel.DEBUG
  } else if (values.quiet) {
    logLevel = LogLevel.ERROR
  }

  return {
    input: positionals[0],
    output: positionals[1] ?? DEFAULT_OUTPUT,
    format,
    scan: {
      strictKeywords: values['strict-keywords'] ?? false,
      collapseCrlf: values['collapse-crlf'] ?? false,
    },
    logLevel,
    help: values.help ?? false,
  }
}

function parseArgsStrict(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'strict-keywords': { type: 'boolean' },
      'collapse-crlf': { type: 'boolean' },
      format: { type: 'string' },
      verbose: { type: 'boolean' },
      quiet: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}

// Files are treated as single-byte text: latin1 maps every byte to one char code.
async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, 'latin1')
  } catch (err) {
    throw new ScanIoError(path, 'read', err)
  }
}

async function writeOutput(path: string, text: string): Promise<void> {
  try {
    await writeFile(path, text, 'latin1')
  } catch (err) {
    throw new ScanIoError(path, 'write', err)
  }
}

/**
 * Run the scanner over a file and write the token listing.
 * Returns the process exit code.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err
    log.error(err.message)
    console.log(USAGE)
    return 1
  }

  const input = options.input
  if (options.help || input === undefined) {
    console.log(USAGE)
    return 0
  }

  Logger.setLevel(options.logLevel ?? parseLogLevel(env.SCANNER_LOG_LEVEL) ?? LogLevel.INFO)

  const { output, format } = options
  try {
    const source = await readSource(input)
    log.debug(`read ${source.length} bytes from ${input}`)

    const lines = new LineSink(format)
    new Scanner(source, options.scan).run({
      token: (token) => lines.token(token),
      diagnostic: (diagnostic) => {
        log.warn(formatDiagnostic(diagnostic))
        lines.diagnostic(diagnostic)
      },
    })

    await writeOutput(output, lines.toString())
    log.info(`scanned ${lines.tokenCount} tokens from ${input} into ${output}`)
    if (lines.diagnosticCount > 0) {
      log.warn(`${lines.diagnosticCount} unrecognized characters skipped`)
    }
    return 0
  } catch (err) {
    if (!(err instanceof ScanIoError)) throw err
    log.error(err.message)
    return 1
  }
}
