// ranked match collector
//   npm run scrape -- [--platforms euw1,kr] [--target 500] [--total 1000] [--patch 16.3] [--dry-run]
import './load-env'
import { ConfigError, loadSettings, type Settings } from '../src/lib/config'
import { createCollector } from '../src/lib/scraper/collector'
import type { RunSummary } from '../src/lib/scraper/orchestrator'
import { hasFlag, readOption } from './args'

// command line flags override the matching environment variables
const FLAG_TO_ENV: Record<string, string> = {
  platforms: 'SCRAPE_PLATFORMS',
  target: 'MATCHES_PER_REGION',
  total: 'MATCHES_TOTAL',
  patch: 'TARGET_PATCH',
  queues: 'QUEUES',
}

function printSummary(summary: RunSummary): void {
  console.log('\n[SCRAPER] ══════════════ summary ══════════════')
  for (const region of summary.regions) {
    const short = region.current < region.target ? ` (short by ${region.target - region.current})` : ''
    console.log(
      `[SCRAPER] ${region.platform.padEnd(5)} ${region.status.padEnd(11)} ${region.current}/${region.target}${short}` +
        ` +${region.stats.inserted} new, ${region.stats.filtered} filtered, ${region.stats.failed} failed` +
        (region.reason && region.status !== 'complete' ? ` - ${region.reason}` : '')
    )
  }
  console.log(
    `[SCRAPER] inserted ${summary.inserted} matches in ${(summary.durationMs / 1000).toFixed(1)}s` +
      (summary.error ? `, aborted: ${summary.error}` : '')
  )
}

async function main(): Promise<number> {
  const env: NodeJS.ProcessEnv = { ...process.env }
  for (const [flag, key] of Object.entries(FLAG_TO_ENV)) {
    const value = readOption(flag)
    if (value !== undefined) env[key] = value
  }

  let settings: Settings
  try {
    settings = loadSettings(env)
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[SCRAPER] ${error.message}`)
      return 1
    }
    throw error
  }

  const dryRun = hasFlag('dry-run')
  const { orchestrator, patch } = await createCollector(settings, {
    dryRun,
    onProgress: ({ platform, current, target }) => {
      if (current % 25 === 0 || current === target) console.log(`[SCRAPER] [${platform}] ${current}/${target}`)
    },
  })

  console.log(
    `[SCRAPER] ${settings.platforms.join(' -> ')} | target ${settings.matchesPerRegion}/region` +
      `${settings.matchesTotal ? `, cap ${settings.matchesTotal}` : ''} | patch ${patch ?? 'any'}${dryRun ? ' | dry run' : ''}`
  )

  const controller = new AbortController()
  const stop = (reason: string) => {
    if (controller.signal.aborted) return
    console.log(`\n[SCRAPER] ${reason} received, finishing in-flight writes...`)
    controller.abort()
  }
  process.once('SIGINT', () => stop('SIGINT'))
  process.once('SIGTERM', () => stop('SIGTERM'))

  const summary = await orchestrator.run(controller.signal)
  printSummary(summary)
  return summary.aborted ? 1 : 0
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error('[SCRAPER] Fatal error:', error)
    process.exit(1)
  })
