import {
  TRACKED_CHANNELS,
  UNKNOWN_STATE,
  isHealthyGateway,
  normalizeChannelState,
  type ChannelState,
  type PartialStatus,
} from './status-record.js'

// Plain `status` output. Older builds print `Label: value` lines; newer ones draw
// box tables (`│ Telegram │ ON │ OK │ … │`).

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export function findLabelValue(text: string, label: string): string | undefined {
  const pattern = new RegExp(`^[ \\t]*${escapeRegExp(label)}[ \\t]*:[ \\t]*(\\S[^\\n]*)$`, 'im')
  const match = pattern.exec(text)
  return match ? match[1].trim() : undefined
}

function findFirstLabelValue(text: string, labels: readonly string[]): string | undefined {
  for (const label of labels) {
    const value = findLabelValue(text, label)
    if (value !== undefined) return value
  }
  return undefined
}

export function findSessionCount(text: string): number | undefined {
  const match = /^[ \t]*Sessions[ \t]*:[ \t]*(\d+)\b/im.exec(text)
  return match ? Number.parseInt(match[1], 10) : undefined
}

/** State token from a table row keyed by `label`: the first all-caps cell after the one following the label. */
export function findTableState(text: string, label: string): string | undefined {
  const pattern = new RegExp(`^│\\s*${escapeRegExp(label)}\\s*│.*?│\\s*([A-Z]+)\\s*│`, 'm')
  const match = pattern.exec(text)
  return match ? match[1] : undefined
}

/** `Gateway: OK`, `Telegram: UP`, `WA: DOWN`, `Sessions: 2` */
export function parseLabelLines(text: string): PartialStatus {
  const channelStates: Record<string, ChannelState> = {}
  for (const channel of TRACKED_CHANNELS) {
    channelStates[channel.id] = normalizeChannelState(findFirstLabelValue(text, channel.textLabels))
  }

  const partial: PartialStatus = {
    gatewayOk: isHealthyGateway(findLabelValue(text, 'Gateway') ?? ''),
    channelStates,
  }
  const sessionCount = findSessionCount(text)
  if (sessionCount !== undefined) partial.sessionCount = sessionCount
  return partial
}

/** Only consulted for channels the label lines left unresolved. */
export function parseTableRows(text: string): PartialStatus {
  const channelStates: Record<string, ChannelState> = {}
  for (const channel of TRACKED_CHANNELS) {
    const token = findTableState(text, channel.textLabels[0])
    channelStates[channel.id] = token ? normalizeChannelState(token) : UNKNOWN_STATE
  }
  return { channelStates }
}
