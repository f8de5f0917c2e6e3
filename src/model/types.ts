// '-' empty, 'A' active TE, 'x' disabled TE
export type Cell = '-' | 'A' | 'x'

export const EMPTY: Cell = '-'
export const ACTIVE: Cell = 'A'
export const DISABLED: Cell = 'x'

// Half-open [start, end)
export type TeRange = {
  start: number
  end: number
}

export interface PositionalStore {
  readonly length: number
  insertRun(at: number, cell: Cell, count: number): void
  setRange(start: number, end: number, cell: Cell): void
  toSequence(): Cell[]
}

export interface Genome {
  readonly length: number
  insertTe(pos: number, len: number): number
  copyTe(te: number, offset: number): number | null
  disableTe(te: number): void
  activeTes(): number[]
  teRange(te: number): TeRange | null
  render(): string
}

export type GenomeKind = 'list' | 'linked'
