import type { Cell, PositionalStore } from './types'
import { EMPTY } from './types'
import { GenomeError } from './errors'

export class ArrayStore implements PositionalStore {
  private cells: Cell[]

  constructor(n: number) {
    this.cells = new Array<Cell>(n).fill(EMPTY)
  }

  get length(): number {
    return this.cells.length
  }

  insertRun(at: number, cell: Cell, count: number): void {
    if (at < 0 || at > this.cells.length) {
      throw new GenomeError('OUT_OF_RANGE', `insert at ${at} outside [0, ${this.cells.length}]`)
    }
    const run = new Array<Cell>(count).fill(cell)
    this.cells = [...this.cells.slice(0, at), ...run, ...this.cells.slice(at)]
  }

  setRange(start: number, end: number, cell: Cell): void {
    if (start < 0 || end > this.cells.length || start > end) {
      throw new GenomeError('OUT_OF_RANGE', `range [${start}, ${end}) outside [0, ${this.cells.length}]`)
    }
    this.cells.fill(cell, start, end)
  }

  toSequence(): Cell[] {
    return [...this.cells]
  }
}
