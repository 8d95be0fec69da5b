/**
 * Suite discovery and execution
 */

import { readdirSync } from 'node:fs'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { Logger } from '@spacekit/core'
import { isBenchmarkSuite, type BenchmarkConfig, type BenchmarkSuite } from './types.js'

const log = Logger.child('[bench]')

/**
 * Import every `<category>/*.bench.ts` under `baseDir`
 */
export async function loadSuites(baseDir: string, categories: readonly string[]): Promise<BenchmarkSuite[]> {
  const suites: BenchmarkSuite[] = []
  for (const category of categories) {
    const dir = join(baseDir, category)
    const files = readdirSync(dir).filter((file) => file.endsWith('.bench.ts'))

    for (const file of files) {
      const module: unknown = await import(pathToFileURL(join(dir, file)).href)
      const suite = typeof module === 'object' && module !== null && 'suite' in module ? module.suite : undefined
      if (isBenchmarkSuite(suite)) {
        suites.push(suite)
      } else {
        log.warn(`${category}/${file} exports no benchmark suite`)
      }
    }
  }
  return suites
}

function selected(suite: BenchmarkSuite, config: BenchmarkConfig): boolean {
  if (config.category !== undefined && suite.category !== config.category) return false
  return config.filter === undefined || suite.name.toLowerCase().includes(config.filter.toLowerCase())
}

/**
 * Run the suites matching the filters, printing one table per suite
 */
export async function runSuites(suites: readonly BenchmarkSuite[], config: BenchmarkConfig): Promise<void> {
  const chosen = suites.filter((suite) => selected(suite, config))
  if (chosen.length === 0) {
    console.log('No benchmarks matched.')
    return
  }

  console.log(`spacekit benchmarks (Node ${process.version}, ${process.platform}/${process.arch})\n`)
  for (const suite of chosen) {
    const started = Date.now()
    const bench = await suite.run(config)
    console.log(`[${suite.category}] ${suite.name} (${((Date.now() - started) / 1000).toFixed(1)}s)`)
    console.table(bench.table())
  }
}
