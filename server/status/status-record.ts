/** `OK`, `DOWN`, `?` (unknown), or the uppercased first word of an unrecognized state. */
export type ChannelState = 'OK' | 'DOWN' | '?' | (string & {})

export const UNKNOWN_STATE = '?'

export type StatusRecord = Readonly<{
  gatewayOk: boolean
  /** Keyed by lower-cased channel name. */
  channelStates: Readonly<Record<string, ChannelState>>
  sessionCount?: number
}>

/** What one parse strategy could tell; merged into a StatusRecord. */
export type PartialStatus = {
  gatewayOk?: boolean
  channelStates?: Record<string, ChannelState>
  sessionCount?: number
}

export type TrackedChannel = {
  id: string
  /** Short label in the rendered summary. */
  shortLabel: string
  /** Labels used by the plain-text output, most specific first. */
  textLabels: readonly string[]
}

export const TRACKED_CHANNELS: readonly TrackedChannel[] = [
  { id: 'telegram', shortLabel: 'TG', textLabels: ['Telegram', 'TG'] },
  { id: 'whatsapp', shortLabel: 'WA', textLabels: ['WhatsApp', 'WA'] },
]

const OK_WORDS = new Set(['ok', 'up', 'reachable', 'running', 'connected', 'configured', 'linked'])
const DOWN_WORDS = new Set(['down', 'error', 'missing', 'unlinked', 'disconnected'])
const HEALTHY_GATEWAY_WORDS = new Set(['ok', 'up', 'reachable', 'running', 'true'])

export function normalizeChannelState(raw: unknown): ChannelState {
  const text = raw === undefined || raw === null ? '' : String(raw).trim()
  if (!text) return UNKNOWN_STATE
  const word = text.split(/\s+/)[0].toLowerCase()
  if (OK_WORDS.has(word)) return 'OK'
  if (DOWN_WORDS.has(word)) return 'DOWN'
  return word.toUpperCase()
}

/** `true`, or a string that is exactly a healthy token (any case). Everything else is down. */
export function isHealthyGateway(raw: unknown): boolean {
  if (raw === true) return true
  if (typeof raw !== 'string') return false
  return HEALTHY_GATEWAY_WORDS.has(raw.trim().toLowerCase())
}

export function isResolved(state: ChannelState | undefined): state is ChannelState {
  return state !== undefined && state !== UNKNOWN_STATE && state !== ''
}

/**
 * Fold partial results in order. Earlier resolved values stay; later partials only
 * fill fields that are still missing or `?`.
 */
export function mergePartials(partials: readonly PartialStatus[]): StatusRecord {
  let gatewayOk: boolean | undefined
  let sessionCount: number | undefined
  const channelStates: Record<string, ChannelState> = {}

  for (const partial of partials) {
    if (gatewayOk === undefined && partial.gatewayOk !== undefined) gatewayOk = partial.gatewayOk
    if (sessionCount === undefined && partial.sessionCount !== undefined) sessionCount = partial.sessionCount
    for (const [name, state] of Object.entries(partial.channelStates ?? {})) {
      const key = name.toLowerCase()
      if (isResolved(channelStates[key])) continue
      channelStates[key] = state || UNKNOWN_STATE
    }
  }

  for (const channel of TRACKED_CHANNELS) {
    if (!channelStates[channel.id]) channelStates[channel.id] = UNKNOWN_STATE
  }

  const record: StatusRecord = sessionCount === undefined
    ? { gatewayOk: gatewayOk ?? false, channelStates: Object.freeze(channelStates) }
    : { gatewayOk: gatewayOk ?? false, channelStates: Object.freeze(channelStates), sessionCount }
  return Object.freeze(record)
}

export const SUMMARY_SEPARATOR = ' · '

export function renderStatusRecord(record: StatusRecord): string {
  const parts = [record.gatewayOk ? 'Gateway OK' : 'Gateway DOWN']
  for (const channel of TRACKED_CHANNELS) {
    parts.push(`${channel.shortLabel} ${record.channelStates[channel.id] ?? UNKNOWN_STATE}`)
  }
  if (record.sessionCount !== undefined) parts.push(`Sessions ${record.sessionCount}`)
  return parts.join(SUMMARY_SEPARATOR)
}
