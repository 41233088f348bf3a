// Patch version utilities
// Riot reports gameVersion as "16.3.512.1"; we key everything on "major.minor"
import { z } from 'zod'

const VERSIONS_URL = 'https://ddragon.leagueoflegends.com/api/versions.json'

// values of TARGET_PATCH that disable the patch filter
const ANY_PATCH = new Set(['', '*', 'any', 'all'])

/**
 * Extract patch version from Riot API gameVersion string
 * "16.3.512.1" -> "16.3", "16.03" -> "16.3"
 */
export function extractPatch(gameVersion: string): string {
  if (!gameVersion) return 'unknown'
  const [major, minor] = gameVersion.trim().split('.')
  const majorNum = Number.parseInt(major ?? '', 10)
  const minorNum = Number.parseInt(minor ?? '', 10)
  if (Number.isNaN(majorNum) || Number.isNaN(minorNum)) return 'unknown'
  return `${majorNum}.${minorNum}`
}

/** null means "no patch filter" */
export function normalizePatch(input: string): string | null {
  const trimmed = input.trim().toLowerCase()
  if (ANY_PATCH.has(trimmed)) return null
  const patch = extractPatch(trimmed)
  if (patch === 'unknown') throw new Error(`invalid patch "${input}"`)
  return patch
}

export function matchesPatch(gameVersion: string, target: string | null): boolean {
  if (target === null) return true
  return extractPatch(gameVersion) === target
}

/**
 * Fetches the current live patch from Data Dragon
 */
export async function getLatestPatch(fetchVersions: typeof fetch = fetch): Promise<string> {
  const response = await fetchVersions(VERSIONS_URL)
  if (!response.ok) {
    throw new Error(`Failed to fetch versions: ${response.status}`)
  }
  const versions = z.array(z.string()).min(1).parse(await response.json())
  return extractPatch(versions[0])
}

/**
 * Resolves TARGET_PATCH: "latest" is looked up on Data Dragon, "any" disables filtering
 */
export async function resolveTargetPatch(target: string, fetchVersions: typeof fetch = fetch): Promise<string | null> {
  if (target.trim().toLowerCase() === 'latest') {
    const latest = await getLatestPatch(fetchVersions)
    console.log(`[PATCH] Resolved latest patch: ${latest}`)
    return latest
  }
  return normalizePatch(target)
}

export interface DateWindow {
  /** epoch ms, inclusive */
  start: number | null
  /** epoch ms, exclusive */
  end: number | null
}

export function inDateWindow(timestampMs: number, window: DateWindow): boolean {
  if (window.start !== null && timestampMs < window.start) return false
  if (window.end !== null && timestampMs >= window.end) return false
  return true
}
