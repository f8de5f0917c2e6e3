import type { TeRange } from './types'

// Returning a range replaces the entry, 'remove' drops it, undefined keeps it.
export type RegistryVisit = (id: number, range: TeRange) => TeRange | 'remove' | undefined

/**
 * Active TEs keyed by id. Ids come from a counter owned by the registry,
 * start at 1 and are never handed out twice. Iteration follows issue order.
 */
export class TeRegistry {
  private entries = new Map<number, TeRange>()
  private counter = 0

  get size(): number {
    return this.entries.size
  }

  get lastId(): number {
    return this.counter
  }

  nextId(): number {
    this.counter++
    return this.counter
  }

  get(id: number): TeRange | null {
    const range = this.entries.get(id)
    return range ? { ...range } : null
  }

  insert(id: number, range: TeRange): void {
    if (this.entries.has(id)) {
      throw new Error(`TE ${id} is already registered`)
    }
    this.entries.set(id, { ...range })
  }

  remove(id: number): TeRange | null {
    const range = this.entries.get(id)
    if (!range) return null
    this.entries.delete(id)
    return range
  }

  forEachMut(fn: RegistryVisit): void {
    // snapshot so removals during the pass don't disturb iteration
    for (const [id, range] of [...this.entries]) {
      const result = fn(id, { ...range })
      if (result === 'remove') {
        this.entries.delete(id)
      } else if (result) {
        this.entries.set(id, { ...result })
      }
    }
  }

  ids(): number[] {
    return [...this.entries.keys()]
  }
}
