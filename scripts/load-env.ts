// side-effect import: fills process.env before any settings are read.
// .env.local wins over .env; variables already set in the shell win over both.
import { config } from 'dotenv'
import { existsSync } from 'node:fs'
import { resolve } from 'node:path'

const ENV_FILES = ['.env.local', '.env']

const loaded = ENV_FILES.map(file => resolve(process.cwd(), file)).filter(path => existsSync(path))

if (loaded.length > 0) {
  config({ path: loaded })
} else if (!process.env.CI && !process.env.GITHUB_ACTIONS) {
  console.warn('[ENV] no .env.local or .env found, relying on the shell environment')
}

export {}
