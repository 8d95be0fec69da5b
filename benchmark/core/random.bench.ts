/**
 * Random Generator Benchmarks
 */

import { createRng, mathRandom, standardNormal, uniformBigInt, uniformInt } from '@spacekit/core'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { createBench, runBench } from '../lib/utils.js'

export const suite: BenchmarkSuite = {
  name: 'Random',
  category: 'core',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)
    const rng = createRng(0)

    bench.add('SeededRNG.next()', () => {
      rng.next()
    })
    bench.add('Math.random()', () => {
      mathRandom.next()
    })
    bench.add('uniformInt [0, 255]', () => {
      uniformInt(rng, 0, 255)
    })
    bench.add('uniformBigInt full int64', () => {
      uniformBigInt(rng, -(2n ** 63n), 2n ** 63n - 1n)
    })
    bench.add('standardNormal', () => {
      standardNormal(rng)
    })

    return runBench(bench, config)
  },
}

export default suite
