import { logger } from '../logger.js'
import type { LauncherConfig } from '../config.js'
import { notify, type Notifier } from '../desktop/notifier.js'
import { spawnDetached, type DetachedLauncher } from '../process-runner.js'
import { joinShellWords } from '../../shared/shell-words.js'
import { buildTerminalInvocation, type TerminalLookupOptions } from './terminal-argv.js'

const log = logger.child({ component: 'terminal-launcher' })

export type TerminalOpenOutcome = 'launched' | 'no-terminal' | 'launch-failed'

export type TerminalLauncherDeps = {
  launch: DetachedLauncher
  notify: Notifier
  lookup?: TerminalLookupOptions
}

const defaultDeps: TerminalLauncherDeps = {
  launch: spawnDetached,
  notify,
}

/**
 * Run `command` visibly in a terminal window that stays open afterwards.
 * Problems are reported through the notifier and the returned outcome.
 */
export async function openInTerminal(
  command: readonly string[],
  config: Pick<LauncherConfig, 'terminal'>,
  deps: TerminalLauncherDeps = defaultDeps,
): Promise<TerminalOpenOutcome> {
  const invocation = buildTerminalInvocation(config.terminal, joinShellWords(command), deps.lookup)
  if (!invocation) {
    await deps.notify('No terminal emulator found')
    return 'no-terminal'
  }

  const result = await deps.launch(invocation.program, invocation.argv.slice(1))
  if (!result.ok) {
    log.error({ argv: invocation.argv, error: result.error }, 'Failed to open terminal')
    await deps.notify(`Failed to open terminal: ${result.error}`)
    return 'launch-failed'
  }

  log.info({ argv: invocation.argv }, 'Opened terminal')
  return 'launched'
}
