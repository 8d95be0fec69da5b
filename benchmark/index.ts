#!/usr/bin/env node
/**
 * Benchmark CLI
 *
 *   npm run bench
 *   npm run bench -- --category spaces --filter sampling --time 500
 */

import { fileURLToPath } from 'node:url'
import { parseArgs } from 'node:util'
import { Logger } from '@spacekit/core'
import { loadSuites, runSuites } from './lib/runner.js'
import type { BenchmarkConfig } from './lib/types.js'

const CATEGORIES = ['core', 'spaces'] as const

const USAGE = `Usage: npm run bench -- [options]

  --category <name>   ${CATEGORIES.join(' | ')}
  --filter <pattern>  suite name contains pattern
  --time <ms>         time per task (default: 1000)
  --no-warmup         skip the warmup phase
  --help, -h          show this message`

function readConfig(): BenchmarkConfig | undefined {
  const { values } = parseArgs({
    options: {
      category: { type: 'string' },
      filter: { type: 'string' },
      time: { type: 'string', default: '1000' },
      'no-warmup': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  })
  if (values.help) return undefined

  return {
    time: Number.parseInt(values.time, 10),
    warmup: !values['no-warmup'],
    category: values.category,
    filter: values.filter,
  }
}

async function main(): Promise<void> {
  const config = readConfig()
  if (config === undefined) {
    console.log(USAGE)
    return
  }
  const suites = await loadSuites(fileURLToPath(new URL('.', import.meta.url)), CATEGORIES)
  await runSuites(suites, config)
}

main().catch((err: unknown) => {
  Logger.error('Benchmark failed:', err)
  process.exitCode = 1
})
