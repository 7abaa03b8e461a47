// CHANGE: model the read position over an in-memory document
// WHY: alternation retries productions from an unchanged position
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c, n ≥ 0: advance(c, n).input = c.input
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 0 ≤ offset ≤ input.length; a cursor is never mutated
// COMPLEXITY: O(1) except locate, which is O(offset)

export interface Cursor {
  readonly input: string
  readonly offset: number
}

export interface Location {
  readonly offset: number
  readonly line: number
  readonly column: number
}

export const cursorAt = (input: string, offset = 0): Cursor => ({
  input,
  offset: Math.min(Math.max(offset, 0), input.length)
})

export const advance = (cursor: Cursor, count: number): Cursor => cursorAt(cursor.input, cursor.offset + count)

export const isAtEnd = (cursor: Cursor): boolean => cursor.offset >= cursor.input.length

export const peek = (cursor: Cursor): string => cursor.input.charAt(cursor.offset)

export const startsWith = (cursor: Cursor, text: string): boolean => cursor.input.startsWith(text, cursor.offset)

/**
 * Describe the character under the cursor for diagnostics.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeFound = (input: string, offset: number): string =>
  offset >= input.length ? "end of input" : `'${input.charAt(offset)}'`

/**
 * Translate an offset into a 1-based line and column.
 *
 * @param input - Whole document.
 * @param offset - Position inside the document.
 * @returns Location with line and column counted from 1.
 *
 * @pure true
 * @complexity O(n) where n = offset
 */
export const locate = (input: string, offset: number): Location => {
  const before = input.slice(0, offset)
  const lineBreak = before.lastIndexOf("\n")
  let line = 1
  for (const char of before) {
    if (char === "\n") {
      line += 1
    }
  }
  return { offset, line, column: offset - lineBreak }
}
