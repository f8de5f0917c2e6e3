import { CELL_EMPTY, INITIAL_CAPACITY, NO_LINK, SENTINEL } from './constants'

/**
 * Circular doubly-linked list kept in an arena. Links are integer handles
 * into the typed arrays; handle 0 is the sentinel that anchors the ring.
 */
export type RingState = {
  capacity: number
  used: number       // handles handed out, sentinel included
  length: number     // cells in the ring, sentinel excluded
  next: Int32Array   // capacity
  prev: Int32Array   // capacity
  cell: Uint8Array   // capacity
}

export function allocate(capacity = INITIAL_CAPACITY): RingState {
  const cap = Math.max(2, capacity)
  const ring: RingState = {
    capacity: cap,
    used: 1,
    length: 0,
    next: new Int32Array(cap).fill(NO_LINK),
    prev: new Int32Array(cap).fill(NO_LINK),
    cell: new Uint8Array(cap).fill(CELL_EMPTY),
  }
  ring.next[SENTINEL] = SENTINEL
  ring.prev[SENTINEL] = SENTINEL
  return ring
}

function grow(ring: RingState): void {
  const cap = ring.capacity * 2
  const next = new Int32Array(cap).fill(NO_LINK)
  const prev = new Int32Array(cap).fill(NO_LINK)
  const cell = new Uint8Array(cap).fill(CELL_EMPTY)
  next.set(ring.next)
  prev.set(ring.prev)
  cell.set(ring.cell)
  ring.capacity = cap
  ring.next = next
  ring.prev = prev
  ring.cell = cell
}

/** Splice a new link holding `value` in after `link`; returns its handle. */
export function insertAfter(ring: RingState, link: number, value: number): number {
  if (ring.used === ring.capacity) grow(ring)
  const h = ring.used++
  const after = ring.next[link]
  ring.cell[h] = value
  ring.prev[h] = link
  ring.next[h] = after
  ring.next[link] = h
  ring.prev[after] = h
  ring.length++
  return h
}

/**
 * Handle of the link just before index k. Always walks forward from the
 * sentinel, so k = 0 yields the sentinel itself.
 */
export function linkBefore(ring: RingState, k: number): number {
  let h = SENTINEL
  for (let i = 0; i < k; i++) h = ring.next[h]
  return h
}

export function collectCells(ring: RingState): number[] {
  const out: number[] = []
  for (let h = ring.next[SENTINEL]; h !== SENTINEL; h = ring.next[h]) {
    out.push(ring.cell[h])
  }
  return out
}
