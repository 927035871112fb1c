import { EOF } from './chars'

/**
 * Forward-only character source. Returns EOF once exhausted.
 */
export interface CharSource {
  next(): number
}

/**
 * Reads a string one char code at a time via charCodeAt().
 */
export class StringSource implements CharSource {
  private pos = 0

  constructor(private readonly src: string) {}

  next(): number {
    if (this.pos >= this.src.length) return EOF
    return this.src.charCodeAt(this.pos++)
  }
}

/**
 * Character cursor with unbounded pushback.
 *
 * Pushed-back content is kept in `pending`, stored in reverse so the next
 * char to read sits at the end of the array. `read()` and `peek()` drain it
 * before touching the underlying source, so any number of chars read during a
 * recognition attempt can be returned with a single `unread()` call.
 */
export class Cursor {
  private readonly source: CharSource
  private readonly pending: number[] = []
  private consumed = 0
  // Chars consumed since the last mark(), net of pushback
  private marked: number[] = []

  constructor(source: CharSource | string) {
    this.source = typeof source === 'string' ? new StringSource(source) : source
  }

  /** Number of chars consumed so far, net of pushback. */
  get offset(): number {
    return this.consumed
  }

  /**
   * Start recording consumed chars at the current position and return its offset.
   */
  mark(): number {
    this.marked = []
    return this.consumed
  }

  /** Chars consumed since the last `mark()`. */
  sinceMark(): string {
    let s = ''
    for (const c of this.marked) s += String.fromCharCode(c)
    return s
  }

  peek(): number {
    if (this.pending.length === 0) {
      const c = this.source.next()
      if (c === EOF) return EOF
      this.pending.push(c)
    }
    return this.pending[this.pending.length - 1]
  }

  read(): number {
    const c = this.pending.length > 0 ? this.pending.pop() : this.source.next()
    if (c === undefined || c === EOF) return EOF
    this.consumed++
    this.marked.push(c)
    return c
  }

  /**
   * Read up to `count` chars, stopping early at EOF.
   */
  readString(count: number): string {
    let s = ''
    while (s.length < count) {
      const c = this.read()
      if (c === EOF) break
      s += String.fromCharCode(c)
    }
    return s
  }

  /**
   * Push `text` back so the following reads return it in its original order.
   * `text` must be the chars most recently read, otherwise `offset` drifts.
   */
  unread(text: string): void {
    for (let i = text.length - 1; i >= 0; i--) {
      this.pending.push(text.charCodeAt(i))
    }
    this.consumed -= text.length
    this.marked.length = Math.max(0, this.marked.length - text.length)
  }
}
