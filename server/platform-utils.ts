import os from 'os'
import fs from 'fs'
import path from 'path'

/**
 * Expand a leading `~` or `~/` to the home directory.
 * `~user` forms are returned unchanged.
 */
export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === '~') return homeDir
  if (p.startsWith('~/')) return path.join(homeDir, p.slice(2))
  return p
}

/** True when `p` is a regular file the current user may execute. */
export function isExecutableFile(p: string): boolean {
  try {
    if (!fs.statSync(p).isFile()) return false
    fs.accessSync(p, fs.constants.X_OK)
    return true
  } catch {
    return false
  }
}

export function pathEntries(env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = env.PATH ?? ''
  return raw.split(path.delimiter).filter((entry) => entry.trim() !== '')
}

/**
 * Look up a bare program name on PATH, like `which`.
 * Returns the first executable match as an absolute path, or null.
 */
export function findOnPath(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (!name || name.includes('/')) return null
  for (const dir of pathEntries(env)) {
    const candidate = path.resolve(dir, name)
    if (isExecutableFile(candidate)) return candidate
  }
  return null
}

export function isOnPath(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
  return findOnPath(name, env) !== null
}
