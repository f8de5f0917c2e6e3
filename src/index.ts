import type { Genome, GenomeKind } from './model/types'
import { LinkedListGenome, ListGenome } from './model/genome'

export type { Cell, Genome, GenomeKind, PositionalStore, TeRange } from './model/types'
export { GenomeError } from './model/errors'
export type { GenomeErrorCode } from './model/errors'
export { TeGenome, ListGenome, LinkedListGenome } from './model/genome'
export { ArrayStore } from './model/arrayStore'
export { LinkedStore } from './linked/store'
export { renderCells } from './model/render'

export function createGenome(kind: GenomeKind, n: number): Genome {
  return kind === 'list' ? new ListGenome(n) : new LinkedListGenome(n)
}
