import type { Genome } from './types'
import { activeIndices } from './render'

export type GenomeOp =
  | { kind: 'insert'; pos: number; len: number }
  | { kind: 'copy'; te: number; offset: number }
  | { kind: 'disable'; te: number }

export type GenomeSnapshot = {
  length: number
  rendered: string
  active: number[]
}

export function applyOp(genome: Genome, op: GenomeOp): number | null {
  switch (op.kind) {
    case 'insert': return genome.insertTe(op.pos, op.len)
    case 'copy': return genome.copyTe(op.te, op.offset)
    case 'disable': {
      genome.disableTe(op.te)
      return null
    }
  }
}

export function snapshot(genome: Genome): GenomeSnapshot {
  return {
    length: genome.length,
    rendered: genome.render(),
    active: genome.activeTes(),
  }
}

export function runScript(genome: Genome, ops: GenomeOp[]): GenomeSnapshot[] {
  return ops.map(op => {
    applyOp(genome, op)
    return snapshot(genome)
  })
}

export function formatOp(op: GenomeOp): string {
  switch (op.kind) {
    case 'insert': return `insert(${op.pos}, ${op.len})`
    case 'copy': return `copy(${op.te}, ${op.offset})`
    case 'disable': return `disable(${op.te})`
  }
}

export function xorshift32(seed: number): () => number {
  let s = seed >>> 0 || 1
  return () => {
    s ^= s << 13
    s ^= s >>> 17
    s ^= s << 5
    return s >>> 0
  }
}

export function randomInt(next: () => number, min: number, max: number): number {
  const span = max - min + 1
  return min + (next() % span)
}

/**
 * Build `count` ops for a genome that starts with `startLength` cells.
 * Insert positions never pass the length the genome is guaranteed to have
 * reached; copies and disables sometimes name ids that were never issued.
 */
export function randomScript(next: () => number, startLength: number, count: number): GenomeOp[] {
  const ops: GenomeOp[] = []
  // copies of inactive TEs add nothing, so only direct inserts count
  let minLength = startLength
  let issued = 0

  for (let i = 0; i < count; i++) {
    const roll = next() % 10
    if (roll < 5 || issued === 0) {
      const len = randomInt(next, 1, 6)
      ops.push({ kind: 'insert', pos: randomInt(next, 0, minLength), len })
      minLength += len
      issued++
    } else if (roll < 8) {
      const te = randomInt(next, 1, issued + 2)
      const offset = randomInt(next, -2 * minLength, 2 * minLength)
      ops.push({ kind: 'copy', te, offset })
      issued++
    } else {
      ops.push({ kind: 'disable', te: randomInt(next, 1, issued + 2) })
    }
  }
  return ops
}

/** Invariant violations for the genome's current state; empty when sound. */
export function checkInvariants(genome: Genome): string[] {
  const problems: string[] = []
  const rendered = genome.render()
  if (rendered.length !== genome.length) {
    problems.push(`render length ${rendered.length} != length ${genome.length}`)
  }

  const covered: number[] = []
  for (const id of genome.activeTes()) {
    const range = genome.teRange(id)
    if (!range) {
      problems.push(`active TE ${id} has no range`)
      continue
    }
    if (range.start >= range.end || range.start < 0 || range.end > genome.length) {
      problems.push(`TE ${id} has bad range [${range.start}, ${range.end})`)
      continue
    }
    for (let i = range.start; i < range.end; i++) covered.push(i)
  }
  covered.sort((a, b) => a - b)
  for (let i = 1; i < covered.length; i++) {
    if (covered[i] === covered[i - 1]) {
      problems.push(`cell ${covered[i]} is covered by two active TEs`)
      break
    }
  }

  const marked = activeIndices(rendered)
  if (marked.join(',') !== covered.join(',')) {
    problems.push(`'A' cells [${marked.join(',')}] != active ranges [${covered.join(',')}]`)
  }
  return problems
}
