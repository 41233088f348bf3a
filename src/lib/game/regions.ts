export type RegionalCluster = 'europe' | 'americas' | 'asia' | 'sea'
export type PlatformCode =
  | 'na1'
  | 'br1'
  | 'la1'
  | 'la2'
  | 'kr'
  | 'jp1'
  | 'eun1'
  | 'euw1'
  | 'ru'
  | 'tr1'
  | 'me1'
  | 'oc1'
  | 'sg2'
  | 'ph2'
  | 'th2'
  | 'tw2'
  | 'vn2'

export interface Platform {
  readonly code: PlatformCode
  readonly label: string
  readonly regional: RegionalCluster
  /** platform-routed host, e.g. euw1.api.riotgames.com */
  readonly host: string
  /** regional host for match-v5 and account-v1 */
  readonly regionalHost: string
  /** alternates within the same sub-region, tried in order when the primary host is unreachable */
  readonly fallbackHosts: readonly string[]
  /** next platform in the default scheduling order, null on the last one */
  readonly next: PlatformCode | null
}

const PLATFORM_DATA: Record<PlatformCode, { label: string; regional: RegionalCluster; fallbacks?: PlatformCode[] }> = {
  euw1: { label: 'EUW', regional: 'europe' },
  eun1: { label: 'EUNE', regional: 'europe' },
  tr1: { label: 'TR', regional: 'europe' },
  ru: { label: 'RU', regional: 'europe' },
  me1: { label: 'MENA', regional: 'europe' },
  na1: { label: 'NA', regional: 'americas' },
  br1: { label: 'BR', regional: 'americas' },
  la1: { label: 'LAN', regional: 'americas' },
  la2: { label: 'LAS', regional: 'americas' },
  kr: { label: 'KR', regional: 'asia' },
  jp1: { label: 'JP', regional: 'asia' },
  oc1: { label: 'OCE', regional: 'sea' },
  sg2: { label: 'SEA', regional: 'sea', fallbacks: ['ph2', 'th2'] },
  ph2: { label: 'PH', regional: 'sea', fallbacks: ['sg2'] },
  th2: { label: 'TH', regional: 'sea', fallbacks: ['sg2'] },
  tw2: { label: 'TW', regional: 'sea' },
  vn2: { label: 'VN', regional: 'sea' },
}

export const RIOT_API_DOMAIN = 'api.riotgames.com'

export function hostFor(routing: string): string {
  return `${routing}.${RIOT_API_DOMAIN}`
}

function buildPlatforms(): ReadonlyMap<PlatformCode, Platform> {
  const codes: PlatformCode[] = []
  for (const code of Object.keys(PLATFORM_DATA)) {
    if (isValidPlatform(code)) codes.push(code)
  }
  const platforms = new Map<PlatformCode, Platform>()
  codes.forEach((code, index) => {
    const data = PLATFORM_DATA[code]
    platforms.set(
      code,
      Object.freeze({
        code,
        label: data.label,
        regional: data.regional,
        host: hostFor(code),
        regionalHost: hostFor(data.regional),
        fallbackHosts: Object.freeze((data.fallbacks ?? []).map(hostFor)),
        next: codes[index + 1] ?? null,
      })
    )
  })
  return platforms
}

export function isValidPlatform(code: string): code is PlatformCode {
  return Object.prototype.hasOwnProperty.call(PLATFORM_DATA, code)
}

const PLATFORMS = buildPlatforms()

export const FIRST_PLATFORM: PlatformCode = 'euw1'

export function getPlatform(code: PlatformCode): Platform {
  const platform = PLATFORMS.get(code)
  if (!platform) throw new Error(`unknown platform ${code}`)
  return platform
}

export function toPlatform(input: string): PlatformCode | null {
  const normalized = input.trim().toLowerCase()
  if (isValidPlatform(normalized)) return normalized
  for (const [code, data] of Object.entries(PLATFORM_DATA)) {
    if (data.label.toLowerCase() === normalized && isValidPlatform(code)) return code
  }
  return null
}

/** walks the static next pointers, starting at `from` */
export function platformSequence(from: PlatformCode = FIRST_PLATFORM): Platform[] {
  const sequence: Platform[] = []
  let cursor: PlatformCode | null = from
  while (cursor) {
    const platform = getPlatform(cursor)
    sequence.push(platform)
    cursor = platform.next
  }
  return sequence
}
