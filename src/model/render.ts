import type { Cell } from './types'

export const CELL_GLYPHS: ReadonlyMap<Cell, string> = new Map([
  ['-', '-'],
  ['A', 'A'],
  ['x', 'x'],
])

// Linear rendering from index 0; the last char is followed by the first.
export function renderCells(cells: Iterable<Cell>): string {
  let s = ''
  for (const c of cells) s += CELL_GLYPHS.get(c) ?? c
  return s
}

export function activeIndices(rendered: string): number[] {
  const out: number[] = []
  for (let i = 0; i < rendered.length; i++) {
    if (rendered[i] === 'A') out.push(i)
  }
  return out
}
