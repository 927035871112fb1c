import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { DEFAULT_OUTPUT, USAGE, main, parseCliArgs } from '../src/cli'
import { CliUsageError } from '../src/util/errors'
import { LogLevel, Logger } from '../src/util/logger'

describe('cli', () => {
  let dir: string
  let log: jest.SpyInstance
  let error: jest.SpyInstance
  let warn: jest.SpyInstance

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'c-scanner-'))
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
    Logger.setLevel(LogLevel.INFO)
    rmSync(dir, { recursive: true, force: true })
  })

  describe('parseCliArgs', () => {
    it('defaults the output path and options', () => {
      expect(parseCliArgs(['in.c'])).toEqual({
        input: 'in.c',
        output: DEFAULT_OUTPUT,
        format: 'plain',
        scan: { strictKeywords: false, collapseCrlf: false },
        logLevel: undefined,
        help: false,
      })
    })

    it('maps flags onto options', () => {
      const options = parseCliArgs([
        'in.c',
        'out.txt',
        '--strict-keywords',
        '--collapse-crlf',
        '--format',
        'tabular',
        '--quiet',
      ])
      expect(options.output).toBe('out.txt')
      expect(options.format).toBe('tabular')
      expect(options.scan).toEqual({ strictKeywords: true, collapseCrlf: true })
      expect(options.logLevel).toBe(LogLevel.ERROR)
    })

    it('rejects unknown flags and formats', () => {
      expect(() => parseCliArgs(['--nope'])).toThrow(CliUsageError)
      expect(() => parseCliArgs(['in.c', '--format', 'xml'])).toThrow('unknown format: xml')
      expect(() => parseCliArgs(['a', 'b', 'c'])).toThrow('unexpected argument: c')
    })
  })

  describe('main', () => {
    it('prints usage and succeeds without arguments', async () => {
      await expect(main([], {})).resolves.toBe(0)
      expect(log).toHaveBeenCalledWith(USAGE)
    })

    it('writes one line per token', async () => {
      const input = join(dir, 'in.c')
      const output = join(dir, 'out.txt')
      writeFileSync(input, 'int x = 1;\n')
      await expect(main([input, output], {})).resolves.toBe(0)
      expect(readFileSync(output, 'latin1')).toBe(
        'REWD: int\nIDEN: x\nOPER: =\nINTE: 1\nSPEC: ;\n',
      )
      expect(log).toHaveBeenCalledWith(`[c-scanner] scanned 5 tokens from ${input} into ${output}`)
    })

    it('writes diagnostics in place and warns about them', async () => {
      const input = join(dir, 'in.c')
      const output = join(dir, 'out.txt')
      writeFileSync(input, 'a $\n')
      await expect(main([input, output, '--format', 'tabular'], {})).resolves.toBe(0)
      expect(readFileSync(output, 'latin1')).toBe("1\tIDEN\ta\n1\tERROR\tunrecognized character '$'\n")
      expect(warn).toHaveBeenCalledWith(
        "[c-scanner] ERROR: unrecognized character '$' on line 1",
      )
    })

    it('honours SCANNER_LOG_LEVEL', async () => {
      const input = join(dir, 'in.c')
      writeFileSync(input, 'x')
      await main([input, join(dir, 'out.txt')], { SCANNER_LOG_LEVEL: 'error' })
      expect(log).not.toHaveBeenCalled()
    })

    it('fails when the input cannot be read', async () => {
      const missing = join(dir, 'missing.c')
      await expect(main([missing, join(dir, 'out.txt')], {})).resolves.toBe(1)
      expect(error).toHaveBeenCalledTimes(1)
      expect(error.mock.calls[0][0]).toContain(`[c-scanner] cannot read ${missing}`)
    })

    it('fails when the output cannot be written', async () => {
      const input = join(dir, 'in.c')
      writeFileSync(input, 'x')
      const output = join(dir, 'no-such-dir', 'out.txt')
      await expect(main([input, output], {})).resolves.toBe(1)
      expect(error.mock.calls[0][0]).toContain(`cannot write ${output}`)
    })

    it('fails on bad arguments', async () => {
      await expect(main(['--format'], {})).resolves.toBe(1)
      expect(log).toHaveBeenCalledWith(USAGE)
    })
  })
})
