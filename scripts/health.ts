// standalone platform health report
//   npm run health -- [--platforms euw1,kr | --all] [--fail-fast] [--json]
import './load-env'
import { loadSettings } from '../src/lib/config'
import { getPlatform, platformSequence, toPlatform, type Platform } from '../src/lib/game/regions'
import { HealthManager } from '../src/lib/health/health-manager'
import { createLogger } from '../src/lib/log'
import { hasFlag, readOption } from './args'

function selectPlatforms(defaults: readonly Platform[]): Platform[] {
  if (hasFlag('all')) return platformSequence()
  const raw = readOption('platforms')
  if (raw === undefined) return [...defaults]
  const platforms: Platform[] = []
  for (const code of raw.split(',')) {
    const platform = toPlatform(code)
    if (!platform) throw new Error(`unknown platform "${code}"`)
    platforms.push(getPlatform(platform))
  }
  return platforms
}

async function main(): Promise<number> {
  const settings = loadSettings()
  const json = hasFlag('json')
  const manager = new HealthManager({
    apiKey: settings.riotApiKey,
    path: settings.health.path,
    cacheTtlMs: settings.health.cacheTtlMs,
    timeouts: settings.health.timeouts,
    logger: createLogger('HEALTH', {}, json ? 'silent' : settings.logLevel),
  })

  const platforms = selectPlatforms(settings.platforms.map(getPlatform))
  const reports = await manager.checkMany(platforms, { failFast: hasFlag('fail-fast') })

  if (json) {
    console.log(JSON.stringify(reports, null, 2))
  } else {
    for (const report of reports) {
      const http = report.http ? `http ${report.http.status ?? '-'}` : 'http skipped'
      const flags = [report.http?.degraded ? 'degraded' : null, report.http?.rateLimited ? 'rate-limited' : null]
        .filter(Boolean)
        .join(', ')
      console.log(
        `[HEALTH] ${report.platform.padEnd(5)} ${report.reachable ? 'UP  ' : 'DOWN'} ${String(report.latencyMs).padStart(5)}ms` +
          ` dns ${report.dns.ok ? 'ok' : report.dns.error} ${http}${flags ? ` (${flags})` : ''}` +
          (report.lastError && !report.reachable ? ` - ${report.lastError}` : '')
      )
    }
  }
  return reports.every(report => report.reachable) ? 0 : 1
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error('[HEALTH] Fatal error:', error)
    process.exit(1)
  })
