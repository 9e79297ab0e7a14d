import { logger } from './logger.js'
import { describeFailure, runCommand, type CommandRunner } from './process-runner.js'

const log = logger.child({ component: 'service-control' })

const SYSTEMCTL_TIMEOUT_MS = 8000

export type ServiceVerb = 'start' | 'stop' | 'restart'

export const SERVICE_VERBS: readonly ServiceVerb[] = ['start', 'stop', 'restart']

export interface ServiceActionResult {
  ok: boolean
  message: string
}

/** Unknown or missing verbs fall back to `restart`. */
export function parseServiceVerb(raw: string | undefined): ServiceVerb {
  const verb = (raw ?? '').trim()
  return SERVICE_VERBS.find((candidate) => candidate === verb) ?? 'restart'
}

/** `systemctl --user <verb> <unit>`; success is exit code zero. */
export async function controlService(
  verb: ServiceVerb,
  unit: string,
  run: CommandRunner = runCommand,
): Promise<ServiceActionResult> {
  const trimmedUnit = unit.trim()
  if (!trimmedUnit) return { ok: false, message: 'No unit configured' }

  const result = await run('systemctl', ['--user', verb, trimmedUnit], { timeoutMs: SYSTEMCTL_TIMEOUT_MS })
  const ok = result.kind === 'ok'
  log.info({ verb, unit: trimmedUnit, ok, outcome: result.kind }, 'systemctl action')
  if (ok) return { ok, message: `${verb} ${trimmedUnit}: OK` }
  return { ok, message: `${verb} ${trimmedUnit}: ${describeFailure(result)}` }
}

/** Follow a user unit's journal; meant to run inside a terminal. */
export function journalFollowCommand(unit: string): string[] {
  return ['journalctl', '--user', '-u', unit.trim(), '-f']
}
