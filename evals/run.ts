/**
 * Eval runner entry point.
 * npm run eval - scores label lookup against evals/datasets. No network needed.
 *
 * Threshold: each eval must score >= 7.0/10 to pass; exits 1 otherwise.
 * Set EVAL_OUTPUT_FILE=evals/results.json to write results for regression tracking.
 */
import { writeFileSync } from 'fs'
import { join } from 'path'
import { runLabelLookupEval } from './label-lookup.eval'

const THRESHOLD = 7.0 / 10

function main() {
  const results: { name: string; passed: boolean; score?: number; error?: string }[] = []

  const lookup = runLabelLookupEval(THRESHOLD)
  for (const miss of lookup.misses) console.log('[eval] miss: %s', miss)
  results.push({ name: 'label-lookup', passed: lookup.passed, score: lookup.score, error: lookup.error })

  const report = {
    timestamp: new Date().toISOString(),
    threshold: THRESHOLD,
    results,
    passed: results.every((r) => r.passed),
  }
  console.log(JSON.stringify({ results: report.results }, null, 2))
  const summary = results
    .map((r) => `${r.name}: ${r.passed ? 'PASS' : 'FAIL'}${r.score != null ? ` (${(r.score * 100).toFixed(0)}%)` : ''}`)
    .join(' | ')
  console.log('Summary:', summary)

  const outputPath = process.env.EVAL_OUTPUT_FILE
  if (outputPath) {
    const abs = join(process.cwd(), outputPath)
    writeFileSync(abs, JSON.stringify(report, null, 2), 'utf-8')
    console.log('Wrote report to', abs)
  }

  process.exit(report.passed ? 0 : 1)
}

main()
