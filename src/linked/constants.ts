import type { Cell } from '../model/types'

// Cell encoding
export const CELL_EMPTY = 0
export const CELL_ACTIVE = 1
export const CELL_DISABLED = 2

// Handle 0 is the sentinel; it sits before index 0 and carries no cell
export const SENTINEL = 0
export const NO_LINK = -1

export const INITIAL_CAPACITY = 16

export const CELL_ENCODE: Record<Cell, number> = {
  '-': CELL_EMPTY, A: CELL_ACTIVE, x: CELL_DISABLED,
}

export const CELL_DECODE: Cell[] = ['-', 'A', 'x']
