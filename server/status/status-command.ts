import type { ResolvedExecutable } from '../executable-resolver.js'
import { runCommand, type CommandRunner } from '../process-runner.js'

const PROBE_TIMEOUT_MS = 1500

/**
 * Command for the verbose status view. Prefers `status --all` when the installed
 * CLI accepts it; older builds only know plain `status`.
 */
export async function verboseStatusCommand(
  executable: ResolvedExecutable,
  run: CommandRunner = runCommand,
): Promise<string[]> {
  const cli = executable.absolutePath
  const probe = await run(cli, ['status', '--all'], { timeoutMs: PROBE_TIMEOUT_MS })
  return probe.kind === 'ok' ? [cli, 'status', '--all'] : [cli, 'status']
}
