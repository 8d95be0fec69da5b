/**
 * Sampling Benchmarks
 *
 * Uniform draws from bounded, unbounded and 64-bit spaces at various shapes.
 */

import { createRng } from '@spacekit/core'
import { space } from '@spacekit/spaces'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { STANDARD_SHAPES, createBench, runBench } from '../lib/utils.js'

export const suite: BenchmarkSuite = {
  name: 'Sampling',
  category: 'spaces',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)
    const rng = createRng(0)

    for (const shape of STANDARD_SHAPES) {
      const label = `[${shape.join(', ')}]`

      const bounded = space('float32', shape, { low: -1, high: 1 })
      bench.add(`float32 bounded ${label}`, () => {
        bounded.sample(rng)
      })

      const unbounded = space('float64', shape)
      bench.add(`float64 unbounded ${label}`, () => {
        unbounded.sample(rng)
      })

      const pixels = space('uint8', shape)
      bench.add(`uint8 ${label}`, () => {
        pixels.sample(rng)
      })

      const wide = space('int64', shape)
      bench.add(`int64 ${label}`, () => {
        wide.sample(rng)
      })
    }

    return runBench(bench, config)
  },
}

export default suite
