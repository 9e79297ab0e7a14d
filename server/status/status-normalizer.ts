import { logger } from '../logger.js'
import { CONFIG_DISPLAY_PATH } from '../config.js'
import type { ResolvedExecutable } from '../executable-resolver.js'
import { describeFailure, runCommand, type CommandRunner } from '../process-runner.js'
import { decodeStatusDocument, extractJsonPartials } from './json-shapes.js'
import { mergePartials, renderStatusRecord, TRACKED_CHANNELS, isResolved, type StatusRecord } from './status-record.js'
import { parseLabelLines, parseTableRows } from './text-shapes.js'

const log = logger.child({ component: 'status-normalizer' })

// Some machines take a while on first call (init, disk wake), so the JSON forms get a generous budget.
const STRUCTURED_TIMEOUT_MS = 8000
const PLAIN_TIMEOUT_MS = 4000

export const STRUCTURED_STATUS_ARGS: readonly (readonly string[])[] = [
  ['status', '--json'],
  ['status', '--format', 'json'],
]

export const PLAIN_STATUS_ARGS: readonly string[] = ['status']

export type StatusOutcome =
  | { kind: 'record'; record: StatusRecord; source: 'json' | 'text' }
  | { kind: 'not-found'; message: string }
  | { kind: 'unavailable'; message: string }

export type SummarizeOptions = {
  run?: CommandRunner
  structuredTimeoutMs?: number
  plainTimeoutMs?: number
}

export function notFoundMessage(executable: ResolvedExecutable): string {
  const shown = executable.configuredAs.trim() || executable.absolutePath
  return `CLI not found (${shown}). Set 'cli' in ${CONFIG_DISPLAY_PATH}`
}

export function parsePlainStatus(text: string): StatusRecord {
  const lines = parseLabelLines(text)
  const channelsMissing = TRACKED_CHANNELS.some((channel) => !isResolved(lines.channelStates?.[channel.id]))
  return mergePartials(channelsMissing ? [lines, parseTableRows(text)] : [lines])
}

/** null when stdout is not a JSON object or carries none of the known status fields. */
export function parseStructuredStatus(stdout: string): StatusRecord | null {
  const doc = decodeStatusDocument(stdout)
  if (!doc) return null
  const partials = extractJsonPartials(doc)
  if (partials.length === 0) return null
  return mergePartials(partials)
}

/**
 * Query the CLI and reduce its answer to a StatusRecord.
 * Tries each JSON form in order, then the plain form. Never rejects.
 */
export async function collectStatus(
  executable: ResolvedExecutable,
  options: SummarizeOptions = {},
): Promise<StatusOutcome> {
  if (!executable.found) {
    return { kind: 'not-found', message: notFoundMessage(executable) }
  }

  const run = options.run ?? runCommand
  const cli = executable.absolutePath

  for (const args of STRUCTURED_STATUS_ARGS) {
    const result = await run(cli, [...args], { timeoutMs: options.structuredTimeoutMs ?? STRUCTURED_TIMEOUT_MS })
    if (result.kind !== 'ok') {
      log.debug({ args, outcome: result.kind, reason: describeFailure(result) }, 'Structured status form failed')
      continue
    }
    const record = parseStructuredStatus(result.stdout)
    if (!record) {
      log.debug({ args }, 'Structured status output had no known status fields')
      continue
    }
    return { kind: 'record', record, source: 'json' }
  }

  const result = await run(cli, [...PLAIN_STATUS_ARGS], { timeoutMs: options.plainTimeoutMs ?? PLAIN_TIMEOUT_MS })
  if (result.kind !== 'ok') {
    log.info({ outcome: result.kind }, 'Status unavailable')
    return { kind: 'unavailable', message: `Status: ${describeFailure(result)}` }
  }
  return { kind: 'record', record: parsePlainStatus(result.stdout), source: 'text' }
}

/** One display line, e.g. `Gateway OK · TG OK · WA DOWN · Sessions 3`. */
export async function summarizeStatus(
  executable: ResolvedExecutable,
  options: SummarizeOptions = {},
): Promise<string> {
  const outcome = await collectStatus(executable, options)
  return outcome.kind === 'record' ? renderStatusRecord(outcome.record) : outcome.message
}
