import fs from 'fs'
import os from 'os'
import path from 'path'
import { logger } from './logger.js'
import { expandHome, findOnPath, isExecutableFile } from './platform-utils.js'

const log = logger.child({ component: 'executable-resolver' })

export const DEFAULT_CLI_NAME = 'clawdbot'

/**
 * Outcome of a resolution attempt. `found: false` is a normal result;
 * `absolutePath` then holds the best guess so messages can name it.
 */
export type ResolvedExecutable = Readonly<{
  absolutePath: string
  found: boolean
  /** What the user configured, verbatim, for error messages. */
  configuredAs: string
}>

export type SemverTuple = readonly [number, number, number]

export type VersionedInstallCandidate = {
  version: SemverTuple
  path: string
}

export type ResolveOptions = {
  env?: NodeJS.ProcessEnv
  homeDir?: string
  /** Roots holding `v<major>.<minor>.<patch>/bin/` subdirectories. Defaults to nvm's. */
  versionRoots?: string[]
  /** Checked last, in order. Defaults to ~/.local/bin, /usr/local/bin, /usr/bin. */
  commonDirs?: string[]
}

const SEMVER_DIR_PATTERN = /^v(\d+)\.(\d+)\.(\d+)$/

/** Parse a version-manager directory name like `v22.14.0`. Anything else sorts lowest. */
export function parseVersionDirName(name: string): SemverTuple {
  const match = SEMVER_DIR_PATTERN.exec(name)
  if (!match) return [0, 0, 0]
  return [Number(match[1]), Number(match[2]), Number(match[3])]
}

export function compareVersions(a: SemverTuple, b: SemverTuple): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return 0
}

/** Primary name first, then aliases in their order, without duplicates. */
export function candidateNames(primary: string, aliases: readonly string[]): string[] {
  const names = [primary]
  for (const alias of aliases) {
    const trimmed = alias.trim()
    if (trimmed && !names.includes(trimmed)) names.push(trimmed)
  }
  return names
}

function defaultVersionRoots(homeDir: string): string[] {
  return [path.join(homeDir, '.nvm', 'versions', 'node')]
}

function defaultCommonDirs(homeDir: string): string[] {
  return [path.join(homeDir, '.local', 'bin'), '/usr/local/bin', '/usr/bin']
}

// Follows symlinks: version managers often link an alias directory to a real install.
function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory()
  } catch {
    return false
  }
}

function listSubdirectories(root: string): string[] {
  try {
    return fs.readdirSync(root).filter((name) => isDirectory(path.join(root, name)))
  } catch {
    return []
  }
}

export function collectVersionedCandidates(
  roots: readonly string[],
  names: readonly string[],
): VersionedInstallCandidate[] {
  const hits: VersionedInstallCandidate[] = []
  for (const root of roots) {
    for (const dirName of listSubdirectories(root)) {
      const version = parseVersionDirName(dirName)
      for (const name of names) {
        const candidate = path.join(root, dirName, 'bin', name)
        if (isExecutableFile(candidate)) hits.push({ version, path: candidate })
      }
    }
  }
  return hits
}

/** Greatest version wins; on equal versions the earliest discovered hit is kept. */
export function pickNewest(hits: readonly VersionedInstallCandidate[]): VersionedInstallCandidate | undefined {
  let best: VersionedInstallCandidate | undefined
  for (const hit of hits) {
    if (!best || compareVersions(hit.version, best.version) > 0) best = hit
  }
  return best
}

/**
 * Resolve a configured program reference to an executable.
 *
 * Order: absolute path (trusted verbatim) → home-relative path (trusted verbatim)
 * → PATH → version-manager installs (newest) → common install dirs.
 * Never throws.
 */
export function resolveExecutable(
  reference: string,
  aliases: readonly string[] = [],
  options: ResolveOptions = {},
): ResolvedExecutable {
  const env = options.env ?? process.env
  const homeDir = options.homeDir ?? os.homedir()
  const configuredAs = reference
  const primary = reference.trim() || DEFAULT_CLI_NAME
  const expanded = expandHome(primary, homeDir)

  if (path.isAbsolute(expanded)) {
    return Object.freeze({ absolutePath: expanded, found: isExecutableFile(expanded), configuredAs })
  }

  if (expanded.includes('/')) {
    const resolved = path.resolve(homeDir, expanded)
    return Object.freeze({ absolutePath: resolved, found: isExecutableFile(resolved), configuredAs })
  }

  const names = candidateNames(expanded, aliases)

  for (const name of names) {
    const hit = findOnPath(name, env)
    if (hit) {
      log.debug({ name, path: hit, source: 'path' }, 'Resolved executable')
      return Object.freeze({ absolutePath: hit, found: true, configuredAs })
    }
  }

  const versionRoots = options.versionRoots ?? defaultVersionRoots(homeDir)
  const newest = pickNewest(collectVersionedCandidates(versionRoots, names))
  if (newest) {
    log.debug({ path: newest.path, version: newest.version.join('.'), source: 'version-manager' }, 'Resolved executable')
    return Object.freeze({ absolutePath: newest.path, found: true, configuredAs })
  }

  const commonDirs = options.commonDirs ?? defaultCommonDirs(homeDir)
  for (const dir of commonDirs) {
    for (const name of names) {
      const candidate = path.join(dir, name)
      if (isExecutableFile(candidate)) {
        log.debug({ path: candidate, source: 'common-dir' }, 'Resolved executable')
        return Object.freeze({ absolutePath: candidate, found: true, configuredAs })
      }
    }
  }

  log.debug({ configuredAs, candidates: names }, 'Executable not found')
  return Object.freeze({ absolutePath: expanded, found: false, configuredAs })
}
