import type { Cell, PositionalStore } from '../model/types'
import { GenomeError } from '../model/errors'
import { CELL_DECODE, CELL_EMPTY, CELL_ENCODE, INITIAL_CAPACITY, SENTINEL } from './constants'
import type { RingState } from './ring'
import { allocate, collectCells, insertAfter, linkBefore } from './ring'

export class LinkedStore implements PositionalStore {
  private ring: RingState

  constructor(n: number) {
    this.ring = allocate(Math.max(INITIAL_CAPACITY, n + 1))
    let tail = SENTINEL
    for (let i = 0; i < n; i++) {
      tail = insertAfter(this.ring, tail, CELL_EMPTY)
    }
  }

  get length(): number {
    return this.ring.length
  }

  insertRun(at: number, cell: Cell, count: number): void {
    if (at < 0 || at > this.ring.length) {
      throw new GenomeError('OUT_OF_RANGE', `insert at ${at} outside [0, ${this.ring.length}]`)
    }
    const value = CELL_ENCODE[cell]
    let h = linkBefore(this.ring, at)
    for (let i = 0; i < count; i++) {
      h = insertAfter(this.ring, h, value)
    }
  }

  setRange(start: number, end: number, cell: Cell): void {
    if (start < 0 || end > this.ring.length || start > end) {
      throw new GenomeError('OUT_OF_RANGE', `range [${start}, ${end}) outside [0, ${this.ring.length}]`)
    }
    const value = CELL_ENCODE[cell]
    let h = this.ring.next[linkBefore(this.ring, start)]
    for (let i = start; i < end; i++) {
      this.ring.cell[h] = value
      h = this.ring.next[h]
    }
  }

  toSequence(): Cell[] {
    return collectCells(this.ring).map(v => CELL_DECODE[v])
  }
}
