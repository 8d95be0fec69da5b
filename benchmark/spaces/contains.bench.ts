/**
 * Membership Benchmarks
 *
 * `contains` on samples, nested arrays and rejected values.
 */

import { createRng } from '@spacekit/core'
import { space } from '@spacekit/spaces'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { STANDARD_SHAPES, createBench, runBench } from '../lib/utils.js'

export const suite: BenchmarkSuite = {
  name: 'Membership',
  category: 'spaces',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)
    const rng = createRng(0)

    for (const shape of STANDARD_SHAPES) {
      const label = `[${shape.join(', ')}]`
      const image = space('uint8', shape)
      const drawn = image.sample(rng)

      bench.add(`contains(sample) ${label}`, () => {
        image.contains(drawn)
      })

      if (typeof drawn !== 'object') continue
      const nested = drawn.toArray()
      bench.add(`contains(nested array) ${label}`, () => {
        image.contains(nested)
      })
    }

    const vector = space('float64', [3], { low: -1, high: 1 })
    bench.add('contains() shape mismatch', () => {
      vector.contains([0, 0, 0, 0])
    })
    bench.add('explain() out of bounds', () => {
      vector.explain([0, 0, 2])
    })

    return runBench(bench, config)
  },
}

export default suite
