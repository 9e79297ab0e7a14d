import { defaultActionDeps, isActionId, matchActions, runAction, type ActionDeps } from '../actions.js'
import { loadConfig, type LauncherConfig } from '../config.js'
import { SERVICE_VERBS, type ServiceVerb } from '../service-control.js'
import { collectStatus, notFoundMessage, type StatusOutcome } from '../status/status-normalizer.js'
import { renderStatusRecord } from '../status/status-record.js'
import type { ResolvedExecutable } from '../executable-resolver.js'
import { buildTerminalInvocation, type TerminalLookupOptions } from '../terminal/terminal-argv.js'
import { joinShellWords } from '../../shared/shell-words.js'
import { getFlag, isTruthy, parseArgs } from './args.js'
import { stdioOutput, type CliOutput } from './output.js'

export type CliDeps = {
  loadConfig: () => LauncherConfig
  actions: ActionDeps
  collectStatus: (executable: ResolvedExecutable) => Promise<StatusOutcome>
  out: CliOutput
  terminalLookup?: TerminalLookupOptions
}

export const defaultCliDeps: CliDeps = {
  loadConfig: () => loadConfig(),
  actions: defaultActionDeps,
  collectStatus: (executable) => collectStatus(executable),
  out: stdioOutput,
}

export const USAGE = `Usage: claw-launcher <command> [options]

Commands:
  actions [query...]        List actions matching a launcher query (default: claw)
  run <action-id>           Run an action (--token <xdg-activation-token>)
  status                    Print the concise status summary
  resolve                   Show which CLI executable would be used
  terminal -- <command...>  Run a command in a terminal window (--dry-run prints argv)
  service <start|stop|restart>
                            Control the gateway service
  open                      Open the dashboard
  config                    Create the config file if needed and print its path

Options:
  --json                    Machine-readable output where supported`

function isServiceVerb(value: string): value is ServiceVerb {
  return SERVICE_VERBS.some((verb) => verb === value)
}

/** Run one CLI invocation and return the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = defaultCliDeps): Promise<number> {
  const { command, flags, args } = parseArgs(argv)
  const out = deps.out
  const json = isTruthy(getFlag(flags, 'json'))

  if (!command || isTruthy(getFlag(flags, 'help', 'h'))) {
    out.text(USAGE)
    return command ? 0 : 1
  }

  const config = deps.loadConfig()

  switch (command) {
    case 'actions': {
      const query = args.length > 0 ? args.join(' ') : 'claw'
      const matches = matchActions(query, config)
      if (json) {
        out.json(matches)
      } else {
        for (const match of matches) out.text(`${match.id}\t${match.title}\t${match.subtext}`)
      }
      return 0
    }

    case 'run': {
      const actionId = args[0]
      if (!actionId || !isActionId(actionId)) {
        out.error(actionId ? `unknown action: ${actionId}` : 'action id required')
        return 1
      }
      const token = getFlag(flags, 'token')
      const actionDeps = typeof token === 'string' ? { ...deps.actions, activationToken: token } : deps.actions
      await runAction(actionId, config, actionDeps)
      return 0
    }

    case 'status': {
      const outcome = await deps.collectStatus(deps.actions.resolveCli(config))
      if (json) {
        out.json(outcome)
      } else {
        out.text(outcome.kind === 'record' ? renderStatusRecord(outcome.record) : outcome.message)
      }
      return outcome.kind === 'record' ? 0 : 1
    }

    case 'resolve': {
      const executable = deps.actions.resolveCli(config)
      if (json) {
        out.json(executable)
      } else if (executable.found) {
        out.text(executable.absolutePath)
      } else {
        out.error(notFoundMessage(executable))
      }
      return executable.found ? 0 : 1
    }

    case 'terminal': {
      if (args.length === 0) {
        out.error('command required: claw-launcher terminal -- <command...>')
        return 1
      }
      if (isTruthy(getFlag(flags, 'dry-run'))) {
        const invocation = buildTerminalInvocation(config.terminal, joinShellWords(args), deps.terminalLookup)
        if (!invocation) {
          out.error('No terminal emulator found')
          return 1
        }
        out.json(invocation.argv)
        return 0
      }
      const outcome = await deps.actions.openInTerminal(args, config)
      return outcome === 'launched' ? 0 : 1
    }

    case 'service': {
      const verb = args[0] ?? ''
      if (!isServiceVerb(verb)) {
        out.error(`verb must be one of: ${SERVICE_VERBS.join(', ')}`)
        return 1
      }
      const result = await deps.actions.controlService(verb, config.gatewayService)
      if (result.ok) {
        out.text(result.message)
      } else {
        out.error(result.message)
      }
      return result.ok ? 0 : 1
    }

    case 'open': {
      const result = await deps.actions.openUrl(config.dashboardUrl)
      if (!result.ok) {
        out.error(result.error)
        return 1
      }
      return 0
    }

    case 'config': {
      out.text(await deps.actions.ensureConfigFile(config))
      return 0
    }

    default:
      out.error(`unknown command: ${command}`)
      return 1
  }
}
