import { logger, withLogContext } from './logger.js'
import { ensureDefaultConfigFile, CONFIG_DISPLAY_PATH, type LauncherConfig } from './config.js'
import { resolveExecutable, type ResolvedExecutable } from './executable-resolver.js'
import { notify, type Notifier } from './desktop/notifier.js'
import { openFile, openUrl, type OpenUrlOptions } from './desktop/url-opener.js'
import type { LaunchResult } from './process-runner.js'
import { controlService, journalFollowCommand, parseServiceVerb, type ServiceActionResult, type ServiceVerb } from './service-control.js'
import { notFoundMessage, summarizeStatus } from './status/status-normalizer.js'
import { verboseStatusCommand } from './status/status-command.js'
import { openInTerminal, type TerminalOpenOutcome } from './terminal/terminal-launcher.js'
import { errorMessage } from './utils.js'

const log = logger.child({ component: 'actions' })

export type ActionId =
  | 'open-dashboard'
  | 'status-concise'
  | 'status-verbose'
  | 'gateway-start'
  | 'gateway-stop'
  | 'gateway-restart'
  | 'logs-gateway'
  | 'logs-runner'
  | 'open-config'
  | 'memory'

/** Secondary buttons a launcher may show next to a match. */
export type ActionButton = 'open' | 'notify' | 'terminal'

type Trigger = 'always' | 'status' | 'gateway' | 'logs' | 'config' | 'memory'

type ActionDefinition = {
  id: ActionId
  title: string
  icon: string
  relevance: number
  trigger: Trigger
  subtext: (config: LauncherConfig) => string
  buttons: readonly ActionButton[]
}

export type ActionMatch = {
  id: ActionId
  title: string
  subtext: string
  icon: string
  relevance: number
  buttons: readonly ActionButton[]
}

export const QUERY_PREFIX = 'claw'

const ACTIONS: readonly ActionDefinition[] = [
  {
    id: 'open-dashboard',
    title: 'Open dashboard',
    icon: 'applications-internet',
    relevance: 1.0,
    trigger: 'always',
    subtext: (config) => config.dashboardUrl,
    buttons: ['open'],
  },
  {
    id: 'status-concise',
    title: 'Status (concise)',
    icon: 'dialog-information',
    relevance: 0.92,
    trigger: 'status',
    subtext: () => 'Gateway/TG/WA/Sessions summary',
    buttons: ['notify'],
  },
  {
    id: 'status-verbose',
    title: 'Status (verbose)',
    icon: 'utilities-terminal',
    relevance: 0.9,
    trigger: 'status',
    subtext: () => 'Open terminal: <cli> status (--all if available)',
    buttons: ['terminal'],
  },
  ...(['start', 'stop', 'restart'] as const).map((verb, index): ActionDefinition => ({
    id: `gateway-${verb}` as const,
    title: `Gateway: ${verb}`,
    icon: 'network-server',
    relevance: 0.865 - index * 0.001,
    trigger: 'gateway',
    subtext: (config) => `systemctl --user ${verb} ${config.gatewayService}`,
    buttons: [],
  })),
  {
    id: 'logs-gateway',
    title: 'Follow gateway logs',
    icon: 'text-x-log',
    relevance: 0.8,
    trigger: 'logs',
    subtext: (config) => `journalctl --user -u ${config.gatewayService} -f`,
    buttons: ['terminal'],
  },
  {
    id: 'logs-runner',
    title: 'Follow launcher logs',
    icon: 'text-x-log',
    relevance: 0.78,
    trigger: 'logs',
    subtext: (config) => `journalctl --user -u ${config.runnerService} -f`,
    buttons: ['terminal'],
  },
  {
    id: 'open-config',
    title: 'Open config',
    icon: 'document-edit',
    relevance: 0.76,
    trigger: 'config',
    subtext: () => CONFIG_DISPLAY_PATH,
    buttons: ['open'],
  },
  {
    id: 'memory',
    title: 'Memory status',
    icon: 'utilities-system-monitor',
    relevance: 0.74,
    trigger: 'memory',
    subtext: () => 'Open terminal: <cli> status --all',
    buttons: ['terminal'],
  },
]

export function isActionId(value: string): value is ActionId {
  return ACTIONS.some((action) => action.id === value)
}

function activeTriggers(query: string): Set<Trigger> {
  const triggers = new Set<Trigger>(['always'])
  if (query === QUERY_PREFIX) {
    return new Set<Trigger>(['always', 'status', 'gateway', 'logs', 'config', 'memory'])
  }
  if (query.includes('status') || query.includes('health')) triggers.add('status')
  if (query.includes('gateway')) triggers.add('gateway')
  if (query.includes('log') || query.includes('journal')) triggers.add('logs')
  if (query.includes('config')) triggers.add('config')
  if (query.includes('mem')) triggers.add('memory')
  return triggers
}

/**
 * Actions offered for a launcher query. Queries must start with `claw`;
 * the bare prefix lists everything.
 */
export function matchActions(query: string, config: LauncherConfig): ActionMatch[] {
  const normalized = query.trim().toLowerCase()
  if (!normalized.startsWith(QUERY_PREFIX)) return []

  const triggers = activeTriggers(normalized)
  return ACTIONS.filter((action) => triggers.has(action.trigger))
    .map((action) => ({
      id: action.id,
      title: action.title,
      subtext: action.subtext(config),
      icon: action.icon,
      relevance: action.relevance,
      buttons: action.buttons,
    }))
    .sort((a, b) => b.relevance - a.relevance)
}

export type ActionDeps = {
  notify: Notifier
  openUrl: (url: string, options?: OpenUrlOptions) => Promise<LaunchResult>
  openFile: (filePath: string, options?: OpenUrlOptions) => Promise<LaunchResult>
  openInTerminal: (command: readonly string[], config: LauncherConfig) => Promise<TerminalOpenOutcome>
  resolveCli: (config: LauncherConfig) => ResolvedExecutable
  summarize: (executable: ResolvedExecutable) => Promise<string>
  verboseCommand: (executable: ResolvedExecutable) => Promise<string[]>
  controlService: (verb: ServiceVerb, unit: string) => Promise<ServiceActionResult>
  ensureConfigFile: (config: LauncherConfig) => Promise<string>
  activationToken?: string
}

export const defaultActionDeps: ActionDeps = {
  notify,
  openUrl: (url, options) => openUrl(url, options),
  openFile: (filePath, options) => openFile(filePath, options),
  openInTerminal: (command, config) => openInTerminal(command, config),
  resolveCli: (config) => resolveExecutable(config.cli, config.cliAliases),
  summarize: (executable) => summarizeStatus(executable),
  verboseCommand: (executable) => verboseStatusCommand(executable),
  controlService: (verb, unit) => controlService(verb, unit),
  ensureConfigFile: (config) => ensureDefaultConfigFile(config),
}

async function dispatch(actionId: ActionId, config: LauncherConfig, deps: ActionDeps): Promise<void> {
  const openOptions: OpenUrlOptions = { activationToken: deps.activationToken }

  switch (actionId) {
    case 'open-dashboard': {
      const result = await deps.openUrl(config.dashboardUrl, openOptions)
      if (!result.ok) await deps.notify(`Could not open dashboard: ${result.error}`)
      return
    }

    case 'open-config': {
      const configPath = await deps.ensureConfigFile(config)
      await deps.openFile(configPath, openOptions)
      await deps.notify(`Config: ${configPath}`)
      return
    }

    case 'status-concise':
      await deps.notify(await deps.summarize(deps.resolveCli(config)))
      return

    case 'status-verbose':
    case 'memory': {
      const executable = deps.resolveCli(config)
      if (!executable.found) {
        await deps.notify(notFoundMessage(executable), { seconds: 6 })
        return
      }
      await deps.openInTerminal(await deps.verboseCommand(executable), config)
      return
    }

    case 'logs-gateway':
      await deps.openInTerminal(journalFollowCommand(config.gatewayService), config)
      return

    case 'logs-runner':
      await deps.openInTerminal(journalFollowCommand(config.runnerService), config)
      return

    case 'gateway-start':
    case 'gateway-stop':
    case 'gateway-restart': {
      const verb = parseServiceVerb(actionId.slice('gateway-'.length))
      const result = await deps.controlService(verb, config.gatewayService)
      await deps.notify(`Gateway: ${result.message}`, { seconds: result.ok ? 3 : 6 })
      return
    }
  }
}

/** Run one action. Never rejects; failures are logged and shown as a notification. */
export async function runAction(
  actionId: string,
  config: LauncherConfig,
  deps: ActionDeps = defaultActionDeps,
): Promise<void> {
  await withLogContext({ actionId }, async () => {
    log.info('Run action')
    if (!isActionId(actionId)) {
      log.warn('Unknown action')
      return
    }
    try {
      await dispatch(actionId, config, deps)
    } catch (err) {
      log.error({ err }, 'Action failed')
      try {
        await deps.notify(`claw-launcher error: ${errorMessage(err)}`)
      } catch (notifyErr) {
        log.error({ err: notifyErr }, 'Failed to report action failure')
      }
    }
  })
}
