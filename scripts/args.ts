// tiny argv helpers: --flag, --name value, --name=value

export function hasFlag(name: string, argv: readonly string[] = process.argv.slice(2)): boolean {
  return argv.includes(`--${name}`)
}

export function readOption(name: string, argv: readonly string[] = process.argv.slice(2)): string | undefined {
  const prefix = `--${name}=`
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg.startsWith(prefix)) return arg.slice(prefix.length)
    if (arg === `--${name}` && i + 1 < argv.length && !argv[i + 1].startsWith('--')) return argv[i + 1]
  }
  return undefined
}
