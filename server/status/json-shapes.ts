import { z } from 'zod'
import {
  isHealthyGateway,
  normalizeChannelState,
  type ChannelState,
  type PartialStatus,
} from './status-record.js'

// The CLI's JSON status has changed shape several times. Each strategy below reads one
// known shape and ignores anything it doesn't recognize.

export const StatusDocumentSchema = z.record(z.string(), z.unknown())
export type StatusDocument = z.infer<typeof StatusDocumentSchema>

export type JsonShape = {
  name: string
  extract: (doc: StatusDocument) => PartialStatus | null
}

const GatewayObjectSchema = z
  .object({
    state: z.unknown().optional(),
    reachable: z.unknown().optional(),
  })
  .passthrough()

const ChannelEntrySchema = z
  .object({
    channel: z.string().optional(),
    name: z.string().optional(),
    state: z.unknown().optional(),
    status: z.unknown().optional(),
  })
  .passthrough()

const LinkChannelSchema = z
  .object({
    id: z.string(),
    linked: z.unknown().optional(),
  })
  .passthrough()

const SessionsObjectSchema = z
  .object({
    active: z.unknown().optional(),
    count: z.unknown().optional(),
  })
  .passthrough()

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null
}

function firstTruthy(...values: unknown[]): unknown {
  return values.find((value) => Boolean(value))
}

export const gatewayShape: JsonShape = {
  name: 'gateway',
  extract(doc) {
    const gateway = doc.gateway
    if (!isPresent(gateway)) return null
    if (typeof gateway === 'boolean' || typeof gateway === 'string') {
      return { gatewayOk: isHealthyGateway(gateway) }
    }
    const parsed = GatewayObjectSchema.safeParse(gateway)
    if (!parsed.success) return { gatewayOk: false }
    const raw = isPresent(parsed.data.state) ? parsed.data.state : parsed.data.reachable
    return { gatewayOk: isHealthyGateway(raw) }
  },
}

/** `channels` / `channelStatus`: `[{ channel|name, state|status }]` */
export const channelListShape: JsonShape = {
  name: 'channel-list',
  extract(doc) {
    const list = firstTruthy(doc.channels, doc.channelStatus)
    if (!Array.isArray(list)) return null
    const channelStates: Record<string, ChannelState> = {}
    for (const item of list) {
      const parsed = ChannelEntrySchema.safeParse(item)
      if (!parsed.success) continue
      const name = (parsed.data.channel || parsed.data.name || '').trim().toLowerCase()
      if (!name) continue
      channelStates[name] = normalizeChannelState(firstTruthy(parsed.data.state, parsed.data.status))
    }
    return { channelStates }
  },
}

/** `channelSummary`: `["Telegram: ok (bot configured)", ...]` */
export const channelSummaryShape: JsonShape = {
  name: 'channel-summary',
  extract(doc) {
    const lines = doc.channelSummary
    if (!Array.isArray(lines)) return null
    const channelStates: Record<string, ChannelState> = {}
    for (const line of lines) {
      if (typeof line !== 'string') continue
      const separator = line.indexOf(':')
      if (separator <= 0) continue
      const name = line.slice(0, separator).trim().toLowerCase()
      if (!name) continue
      channelStates[name] = normalizeChannelState(line.slice(separator + 1))
    }
    return { channelStates }
  },
}

/** `linkChannel`: `{ id: "whatsapp", linked: true }` */
export const linkChannelShape: JsonShape = {
  name: 'link-channel',
  extract(doc) {
    const parsed = LinkChannelSchema.safeParse(doc.linkChannel)
    if (!parsed.success) return null
    const name = parsed.data.id.trim().toLowerCase()
    if (!name || typeof parsed.data.linked !== 'boolean') return null
    return { channelStates: { [name]: parsed.data.linked ? 'OK' : 'DOWN' } }
  },
}

/** `sessions.active`, `sessions.count`, numeric `sessions`, `sessionCount`: first present wins. */
export const sessionCountShape: JsonShape = {
  name: 'session-count',
  extract(doc) {
    const candidates: unknown[] = []
    const sessions = SessionsObjectSchema.safeParse(doc.sessions)
    if (sessions.success) {
      candidates.push(sessions.data.active, sessions.data.count)
    } else {
      candidates.push(doc.sessions)
    }
    candidates.push(doc.sessionCount)

    const first = candidates.find(isPresent)
    if (typeof first !== 'number' || !Number.isInteger(first)) return null
    return { sessionCount: first }
  },
}

/** Most specific shapes first: a resolved channel state is never overwritten by a later shape. */
export const JSON_SHAPES: readonly JsonShape[] = [
  gatewayShape,
  channelListShape,
  channelSummaryShape,
  linkChannelShape,
  sessionCountShape,
]

/** Decode CLI stdout into a status document, or null when it isn't a JSON object. */
export function decodeStatusDocument(stdout: string): StatusDocument | null {
  if (!stdout.trim()) return null
  let decoded: unknown
  try {
    decoded = JSON.parse(stdout)
  } catch {
    return null
  }
  const parsed = StatusDocumentSchema.safeParse(decoded)
  return parsed.success ? parsed.data : null
}

export function extractJsonPartials(doc: StatusDocument, shapes: readonly JsonShape[] = JSON_SHAPES): PartialStatus[] {
  const partials: PartialStatus[] = []
  for (const shape of shapes) {
    const partial = shape.extract(doc)
    if (partial) partials.push(partial)
  }
  return partials
}
