import { scanToLines } from '../src/index'
import { Scanner } from '../src/lexer/scanner'
import { readdirSync, readFileSync } from 'fs'
import { join } from 'path'

const fixturesDir = join(__dirname, '..', 'fixtures')
const fixtureFiles = readdirSync(fixturesDir).filter((f) => f.endsWith('.c'))

describe('fixtures', () => {
  for (const file of fixtureFiles) {
    describe(file, () => {
      const source = readFileSync(join(fixturesDir, file), 'latin1')

      it('matches the expected token listing', () => {
        const expected = readFileSync(join(fixturesDir, file.replace(/\.c$/, '.txt')), 'latin1')
        const output = scanToLines(source)
          .map((line) => line + '\n')
          .join('')
        expect(output).toBe(expected)
      })

      it('accounts for every input char', () => {
        const { tokens, diagnostics } = new Scanner(source).scan()
        const spans = [
          ...tokens.map((t) => ({ start: t.start, end: t.end })),
          ...diagnostics.map((d) => ({ start: d.offset, end: d.offset + 1 })),
        ].sort((a, b) => a.start - b.start)

        let rebuilt = ''
        let pos = 0
        for (const span of spans) {
          const gap = source.slice(pos, span.start)
          expect(gap).toMatch(/^[ \t\r\n]*$/)
          rebuilt += gap + source.slice(span.start, span.end)
          pos = span.end
        }
        rebuilt += source.slice(pos)
        expect(rebuilt).toBe(source)
      })
    })
  }
})
