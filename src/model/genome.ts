import type { Genome, PositionalStore, TeRange } from './types'
import { ACTIVE, DISABLED } from './types'
import { GenomeError, requireInteger } from './errors'
import { TeRegistry } from './registry'
import { renderCells } from './render'
import { ArrayStore } from './arrayStore'
import { LinkedStore } from '../linked/store'

function circularize(pos: number, length: number): number {
  if (length === 0) return 0
  return ((pos % length) + length) % length
}

/**
 * A circular genome that TEs get inserted into. Collision and shifting
 * rules live here; cell storage is whatever PositionalStore it is given.
 */
export class TeGenome implements Genome {
  private readonly store: PositionalStore
  private readonly registry = new TeRegistry()

  constructor(store: PositionalStore) {
    this.store = store
  }

  get length(): number {
    return this.store.length
  }

  /**
   * Insert a new active TE of `len` cells at `pos`. Any active TE whose
   * span contains `pos` is disabled; TEs starting after `pos` move up by
   * `len`. Throws OUT_OF_RANGE when pos > length.
   */
  insertTe(pos: number, len: number): number {
    requireInteger(len, 'TE length', 1)
    if (!Number.isInteger(pos)) {
      throw new GenomeError('INVALID_ARGUMENT', `position must be an integer, got ${pos}`)
    }
    if (pos > this.store.length) {
      throw new GenomeError('OUT_OF_RANGE', `position ${pos} is past the genome end ${this.store.length}`)
    }
    const p = circularize(pos, this.store.length)

    this.registry.forEachMut((_id, { start, end }) => {
      if (start <= p && p < end) {
        this.store.setRange(start, end, DISABLED)
        return 'remove'
      }
      if (start > p) {
        return { start: start + len, end: end + len }
      }
      return undefined
    })

    const id = this.registry.nextId()
    this.registry.insert(id, { start: p, end: p + len })
    this.store.insertRun(p, ACTIVE, len)
    return id
  }

  /**
   * Copy an active TE to `offset` cells from its current start, wrapping
   * around the ring. Returns null, touching nothing, if `te` is not active.
   */
  copyTe(te: number, offset: number): number | null {
    const range = this.registry.get(te)
    if (!range) return null
    if (!Number.isInteger(offset)) {
      throw new GenomeError('INVALID_ARGUMENT', `offset must be an integer, got ${offset}`)
    }

    let p = range.start + offset
    if (p < 0) p = this.store.length + p
    if (p < 0 || p >= this.store.length) p = circularize(p, this.store.length)
    return this.insertTe(p, range.end - range.start)
  }

  disableTe(te: number): void {
    const range = this.registry.remove(te)
    if (!range) return
    this.store.setRange(range.start, range.end, DISABLED)
  }

  activeTes(): number[] {
    return this.registry.ids()
  }

  teRange(te: number): TeRange | null {
    return this.registry.get(te)
  }

  render(): string {
    return renderCells(this.store.toSequence())
  }

  toString(): string {
    return this.render()
  }
}

export class ListGenome extends TeGenome {
  constructor(n: number) {
    requireInteger(n, 'genome length', 0)
    super(new ArrayStore(n))
  }
}

export class LinkedListGenome extends TeGenome {
  constructor(n: number) {
    requireInteger(n, 'genome length', 0)
    super(new LinkedStore(n))
  }
}
