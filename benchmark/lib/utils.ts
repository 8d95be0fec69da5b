/**
 * Helpers shared by the benchmark suites
 */

import { Bench } from 'tinybench'
import type { BenchmarkConfig } from './types.js'

export function createBench(config: BenchmarkConfig): Bench {
  return new Bench({ time: config.time })
}

/**
 * Warm up (unless disabled) and run every task
 */
export async function runBench(bench: Bench, config: BenchmarkConfig): Promise<Bench> {
  if (config.warmup) {
    await bench.warmup()
  }
  await bench.run()
  return bench
}

/**
 * Space shapes from a scalar up to an RGB frame
 */
export const STANDARD_SHAPES: number[][] = [[], [4], [84, 84], [64, 64, 3]]
