/**
 * Benchmark suite contract
 */

import type { Bench } from 'tinybench'

export interface BenchmarkConfig {
  /** Time in ms per task (default: 1000) */
  time: number
  /** Warm up before measuring (default: true) */
  warmup: boolean
  /** Only run suites whose name contains this (case-insensitive) */
  filter?: string
  /** Only run suites of this category */
  category?: string
}

/**
 * What a `*.bench.ts` module exports as `suite`
 */
export interface BenchmarkSuite {
  name: string
  /** Directory the suite lives in: 'core' or 'spaces' */
  category: string
  run(config: BenchmarkConfig): Promise<Bench>
}

export function isBenchmarkSuite(value: unknown): value is BenchmarkSuite {
  if (typeof value !== 'object' || value === null) return false
  return 'name' in value && 'category' in value && 'run' in value && typeof value.run === 'function'
}
