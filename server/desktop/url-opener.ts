import os from 'os'
import { pathToFileURL } from 'url'
import { logger } from '../logger.js'
import { expandHome, isOnPath } from '../platform-utils.js'
import { spawnDetached, type DetachedLauncher, type LaunchResult } from '../process-runner.js'

const log = logger.child({ component: 'url-opener' })

export interface OpenCommand {
  command: string
  args: string[]
}

export interface OpenUrlOptions {
  /** XDG activation token handed over by the launcher, for focus-stealing prevention. */
  activationToken?: string
  /** Pre-resolved platform string; defaults to process.platform. */
  platform?: string
}

export type UrlOpenerDeps = {
  isAvailable: (name: string) => boolean
  launch: DetachedLauncher
  env: NodeJS.ProcessEnv
}

const defaultDeps: UrlOpenerDeps = {
  isAvailable: (name) => isOnPath(name),
  launch: spawnDetached,
  env: process.env,
}

/** Openers to try, in order, for the given platform. */
export function openCommandCandidates(platform: string, url: string): OpenCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'open', args: [url] }]
    default:
      return [
        { command: 'xdg-open', args: [url] },
        { command: 'kde-open6', args: [url] },
        { command: 'kde-open5', args: [url] },
        { command: 'gio', args: ['open', url] },
      ]
  }
}

/**
 * Open a URL with the first available desktop opener. Each installed candidate is
 * tried until one launches; the opened application is not waited on.
 */
export async function openUrl(
  url: string,
  options: OpenUrlOptions = {},
  deps: UrlOpenerDeps = defaultDeps,
): Promise<LaunchResult> {
  const env: NodeJS.ProcessEnv = options.activationToken
    ? { ...deps.env, XDG_ACTIVATION_TOKEN: options.activationToken }
    : { ...deps.env }

  const errors: string[] = []
  for (const candidate of openCommandCandidates(options.platform ?? process.platform, url)) {
    if (!deps.isAvailable(candidate.command)) continue
    const result = await deps.launch(candidate.command, candidate.args, { env })
    if (result.ok) {
      log.info({ url, opener: candidate.command }, 'Opened URL')
      return result
    }
    errors.push(result.error)
  }

  const error = errors.length > 0 ? errors.join('; ') : 'No URL opener found'
  log.warn({ url, error }, 'Failed to open URL')
  return { ok: false, error }
}

export async function openFile(
  filePath: string,
  options: OpenUrlOptions = {},
  deps: UrlOpenerDeps = defaultDeps,
): Promise<LaunchResult> {
  return openUrl(pathToFileURL(expandHome(filePath, os.homedir())).href, options, deps)
}
