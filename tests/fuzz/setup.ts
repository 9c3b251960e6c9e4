/**
 * Vitest setup: fast-check defaults for the property tests.
 *
 * FUZZ_ITERATIONS raises the run count for deeper local runs; FUZZ_VERBOSE
 * prints counterexample details.
 */
import * as fc from 'fast-check'

const requested = parseInt(process.env.FUZZ_ITERATIONS ?? '', 10)
const numRuns = Number.isNaN(requested) || requested < 1 ? 50 : requested
const verbose = process.env.FUZZ_VERBOSE === 'true'

fc.configureGlobal({ numRuns, verbose })

if (verbose) {
  console.log(`fast-check: ${numRuns} runs per property`)
}
