import { defaultModel } from '../lib/prebuilt.js'
import { evaluate } from '../lib/forward.js'
import { posteriorDecode } from '../lib/posterior.js'
import { viterbiDecode } from '../lib/viterbi.js'
import { randomSequence, seededRandom } from '../lib/random.js'

function hrMs(n: bigint) { return Number(n) / 1e6 }

function timeIt(label: string, iterations: number, fn: () => unknown) {
  for (let i = 0; i < 10; i++) fn() // warm-up
  const t0 = process.hrtime.bigint()
  for (let i = 0; i < iterations; i++) fn()
  const t1 = process.hrtime.bigint()
  const avg = hrMs(t1 - t0) / iterations
  console.log(`  ${label.padEnd(16)} ${avg.toFixed(4)}ms avg over ${iterations}`)
  return avg
}

async function run() {
  const model = defaultModel()
  // fixed seed so every run times the same sequences
  const rand = seededRandom(42)
  const sequences = ['ATCGGATCGCG', ...[50, 100, 500, 1000, 10000].map(n => randomSequence(n, rand))]

  const summary: Array<{ length: number; evaluate: number; posterior: number; viterbi: number }> = []
  for (const seq of sequences) {
    const iterations = seq.length >= 10000 ? 50 : 1000
    console.log(`length ${seq.length}: logLikelihood ${evaluate(model, seq).toFixed(6)}`)
    summary.push({
      length: seq.length,
      evaluate: timeIt('evaluate', iterations, () => evaluate(model, seq)),
      posterior: timeIt('posteriorDecode', iterations, () => posteriorDecode(model, seq, 0.5)),
      viterbi: timeIt('viterbiDecode', iterations, () => viterbiDecode(model, seq))
    })
  }

  console.log('\nSummary (ms per call):')
  console.table(summary)
}

run().catch(err => { console.error(err); process.exit(1) })
