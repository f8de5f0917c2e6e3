import { describe, it, expect } from 'vitest'
import {
  applyOp,
  checkInvariants,
  formatOp,
  randomInt,
  randomScript,
  runScript,
  snapshot,
  xorshift32,
  type GenomeOp,
} from '../script'
import { activeIndices, renderCells } from '../render'
import { LinkedListGenome, ListGenome } from '../genome'
import type { Genome } from '../types'

describe('renderCells', () => {
  it('maps each cell to one character', () => {
    expect(renderCells(['-', 'A', 'x', 'A'])).toBe('-AxA')
    expect(renderCells([])).toBe('')
  })

  it('finds active cells in a rendering', () => {
    expect(activeIndices('-AAx-A')).toEqual([1, 2, 5])
  })
})

describe('operation scripts', () => {
  it('replays ops and records a snapshot per step', () => {
    const ops: GenomeOp[] = [
      { kind: 'insert', pos: 5, len: 3 },
      { kind: 'insert', pos: 2, len: 2 },
      { kind: 'copy', te: 2, offset: 1 },
      { kind: 'disable', te: 1 },
    ]
    const snaps = runScript(new ListGenome(10), ops)
    expect(snaps.map(s => s.length)).toEqual([13, 15, 17, 17])
    expect(snaps[3]).toEqual({
      length: 17,
      rendered: '--xAAx---xxx-----',
      active: [3],
    })
  })

  it('returns the id an op produced', () => {
    const g = new LinkedListGenome(4)
    expect(applyOp(g, { kind: 'insert', pos: 0, len: 1 })).toBe(1)
    expect(applyOp(g, { kind: 'copy', te: 7, offset: 1 })).toBeNull()
    expect(applyOp(g, { kind: 'disable', te: 1 })).toBeNull()
    expect(snapshot(g)).toEqual({ length: 5, rendered: 'x----', active: [] })
  })

  it('formats ops for reports', () => {
    expect(formatOp({ kind: 'insert', pos: 3, len: 2 })).toBe('insert(3, 2)')
    expect(formatOp({ kind: 'copy', te: 1, offset: -4 })).toBe('copy(1, -4)')
    expect(formatOp({ kind: 'disable', te: 9 })).toBe('disable(9)')
  })

  it('generates the same script from the same seed', () => {
    expect(xorshift32(1)()).toBe(270369)
    const a = randomScript(xorshift32(7), 12, 30)
    const b = randomScript(xorshift32(7), 12, 30)
    expect(a).toEqual(b)
    expect(a).toHaveLength(30)
    expect(a[0].kind).toBe('insert')
  })

  it('keeps random ints inside the requested bounds', () => {
    const next = xorshift32(3)
    for (let i = 0; i < 200; i++) {
      const n = randomInt(next, -5, 5)
      expect(n).toBeGreaterThanOrEqual(-5)
      expect(n).toBeLessThanOrEqual(5)
    }
  })
})

describe('checkInvariants', () => {
  it('reports a rendering that disagrees with the length', () => {
    const broken: Genome = {
      length: 3,
      insertTe: () => 0,
      copyTe: () => null,
      disableTe: () => undefined,
      activeTes: () => [1],
      teRange: () => ({ start: 1, end: 2 }),
      render: () => '-A',
    }
    expect(checkInvariants(broken)).toEqual(['render length 2 != length 3'])
  })

  it('reports active cells without a registered TE', () => {
    const broken: Genome = {
      length: 3,
      insertTe: () => 0,
      copyTe: () => null,
      disableTe: () => undefined,
      activeTes: () => [],
      teRange: () => null,
      render: () => '-A-',
    }
    expect(checkInvariants(broken)).toEqual(["'A' cells [1] != active ranges []"])
  })
})

describe('list and linked genomes under random scripts', () => {
  for (let seed = 1; seed <= 30; seed++) {
    it(`agree at every step (seed ${seed})`, () => {
      const next = xorshift32(seed)
      const start = randomInt(next, 1, 20)
      const ops = randomScript(next, start, 80)
      const list = new ListGenome(start)
      const linked = new LinkedListGenome(start)

      for (const [i, op] of ops.entries()) {
        expect(applyOp(linked, op), `step ${i} ${formatOp(op)}`).toBe(applyOp(list, op))
        const a = snapshot(list)
        expect(snapshot(linked), `step ${i} ${formatOp(op)}`).toEqual(a)
        expect(a.rendered).toHaveLength(a.length)
        expect(checkInvariants(list)).toEqual([])
      }
    })
  }
})
