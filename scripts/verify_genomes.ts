/**
 * Verification script: replay random operation scripts against the list
 * and linked-list genomes and compare them after every step.
 *
 * Run with: npx tsx scripts/verify_genomes.ts [trials] [seed]
 */

import { createGenome } from '../src/index'
import { applyOp, checkInvariants, formatOp, randomInt, randomScript, snapshot, xorshift32 } from '../src/model/script'
import type { GenomeSnapshot } from '../src/model/script'

type VerifyConfig = {
  trials: number
  seed: number
  ops: number
  maxStartLength: number
  maxFailures: number
}

const DEFAULTS: VerifyConfig = {
  trials: 2_000,
  seed: 1,
  ops: 60,
  maxStartLength: 30,
  maxFailures: 20,
}

function parseArg(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`expected a positive integer argument, got "${raw}"`)
  }
  return n
}

const config: VerifyConfig = {
  ...DEFAULTS,
  trials: parseArg(process.argv[2], DEFAULTS.trials),
  seed: parseArg(process.argv[3], DEFAULTS.seed),
}

function sameSnapshot(a: GenomeSnapshot, b: GenomeSnapshot): boolean {
  return a.length === b.length
    && a.rendered === b.rendered
    && a.active.join(',') === b.active.join(',')
}

let passed = 0
let failed = 0

for (let trial = 0; trial < config.trials; trial++) {
  const next = xorshift32(config.seed + trial)
  const startLength = randomInt(next, 1, config.maxStartLength)
  const ops = randomScript(next, startLength, config.ops)

  const list = createGenome('list', startLength)
  const linked = createGenome('linked', startLength)

  let mismatch: string | null = null
  for (let i = 0; i < ops.length && mismatch === null; i++) {
    const listId = applyOp(list, ops[i])
    const linkedId = applyOp(linked, ops[i])
    const a = snapshot(list)
    const b = snapshot(linked)
    if (listId !== linkedId || !sameSnapshot(a, b)) {
      mismatch = `step ${i} ${formatOp(ops[i])}\n  list:   ${a.rendered} [${a.active.join(',')}]\n  linked: ${b.rendered} [${b.active.join(',')}]`
      continue
    }
    const problems = checkInvariants(list)
    if (problems.length > 0) {
      mismatch = `step ${i} ${formatOp(ops[i])}: ${problems.join('; ')}`
    }
  }

  if (mismatch === null) {
    passed++
  } else {
    failed++
    console.log(`MISMATCH trial=${trial} start=${startLength}`)
    console.log(`  ${mismatch}`)
    if (failed >= config.maxFailures) {
      console.log('Too many failures, stopping early.')
      break
    }
  }
}

console.log(`\n${passed} passed, ${failed} failed out of ${config.trials} trials (seed ${config.seed})`)
if (failed > 0) process.exitCode = 1
