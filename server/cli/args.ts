export type ParsedArgs = {
  command?: string
  flags: Record<string, string | boolean>
  args: string[]
}

// Flags that never take a value, so a following token stays positional.
const BOOLEAN_FLAGS = new Set([
  'json',
  'dry-run',
  'help',
  'h',
])

function isNegativeNumericToken(token: string): boolean {
  return /^-\d+(?:\.\d+)?(?:[eE][-+]?\d+)?$/.test(token)
}

function canUseAsFlagValue(token: string | undefined, key: string): token is string {
  if (!token) return false
  if (token === '--') return false
  if (BOOLEAN_FLAGS.has(key)) return false
  return !token.startsWith('-') || isNegativeNumericToken(token)
}

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {}
  const args: string[] = []
  let command: string | undefined
  let i = 0

  while (i < argv.length) {
    const token = argv[i]
    if (!command && !token.startsWith('-')) {
      command = token
      i += 1
      continue
    }

    if (token === '--') {
      args.push(...argv.slice(i + 1))
      break
    }

    if (token.startsWith('--')) {
      const raw = token.slice(2)
      const eqIndex = raw.indexOf('=')
      if (eqIndex >= 0) {
        flags[raw.slice(0, eqIndex)] = raw.slice(eqIndex + 1)
        i += 1
        continue
      }
      const next = argv[i + 1]
      if (canUseAsFlagValue(next, raw)) {
        flags[raw] = next
        i += 2
        continue
      }
      flags[raw] = true
      i += 1
      continue
    }

    if (token.startsWith('-') && token.length > 1) {
      const key = token.slice(1)
      const next = argv[i + 1]
      if (canUseAsFlagValue(next, key)) {
        flags[key] = next
        i += 2
        continue
      }
      flags[key] = true
      i += 1
      continue
    }

    args.push(token)
    i += 1
  }

  return { command, flags, args }
}

export function getFlag(flags: ParsedArgs['flags'], ...names: string[]): string | boolean | undefined {
  for (const name of names) {
    if (flags[name] !== undefined) return flags[name]
  }
  return undefined
}

export const isTruthy = (value: unknown) => value === true || value === 'true' || value === '1' || value === 'yes'
