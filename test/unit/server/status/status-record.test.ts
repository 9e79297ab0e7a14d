import { describe, it, expect } from 'vitest'
import {
  isHealthyGateway,
  mergePartials,
  normalizeChannelState,
  renderStatusRecord,
} from '../../../../server/status/status-record.js'

describe('normalizeChannelState', () => {
  it('maps healthy words to OK', () => {
    for (const word of ['ok', 'UP', 'reachable', 'Running', 'connected', 'configured', 'linked']) {
      expect(normalizeChannelState(word)).toBe('OK')
    }
  })

  it('maps failure words to DOWN', () => {
    for (const word of ['down', 'Error', 'missing', 'unlinked', 'disconnected']) {
      expect(normalizeChannelState(word)).toBe('DOWN')
    }
  })

  it('uses only the first word', () => {
    expect(normalizeChannelState(' ok (bot configured)')).toBe('OK')
  })

  it('uppercases unknown tokens', () => {
    expect(normalizeChannelState('pairing required')).toBe('PAIRING')
  })

  it('maps empty and absent values to ?', () => {
    expect(normalizeChannelState('')).toBe('?')
    expect(normalizeChannelState('   ')).toBe('?')
    expect(normalizeChannelState(undefined)).toBe('?')
    expect(normalizeChannelState(null)).toBe('?')
  })
})

describe('isHealthyGateway', () => {
  it('accepts true and healthy words in any case', () => {
    expect(isHealthyGateway(true)).toBe(true)
    expect(isHealthyGateway(' Reachable ')).toBe(true)
    expect(isHealthyGateway('TRUE')).toBe(true)
  })

  it('judges the whole value, not its first word', () => {
    expect(isHealthyGateway('running degraded')).toBe(false)
    expect(isHealthyGateway('ok?')).toBe(false)
    expect(isHealthyGateway('reachable (12ms)')).toBe(false)
  })

  it('rejects everything else', () => {
    expect(isHealthyGateway(false)).toBe(false)
    expect(isHealthyGateway('unreachable')).toBe(false)
    expect(isHealthyGateway(1)).toBe(false)
    expect(isHealthyGateway(undefined)).toBe(false)
  })
})

describe('mergePartials', () => {
  it('keeps the first resolved value for each field', () => {
    const record = mergePartials([
      { gatewayOk: true, channelStates: { telegram: 'OK', whatsapp: '?' } },
      { gatewayOk: false, channelStates: { telegram: 'DOWN', whatsapp: 'DOWN' }, sessionCount: 2 },
      { sessionCount: 5 },
    ])
    expect(record).toEqual({
      gatewayOk: true,
      channelStates: { telegram: 'OK', whatsapp: 'DOWN' },
      sessionCount: 2,
    })
  })

  it('lower-cases channel keys', () => {
    const record = mergePartials([{ channelStates: { Telegram: 'OK' } }])
    expect(record.channelStates).toEqual({ telegram: 'OK', whatsapp: '?' })
  })

  it('defaults missing fields', () => {
    const record = mergePartials([])
    expect(record).toEqual({ gatewayOk: false, channelStates: { telegram: '?', whatsapp: '?' } })
    expect('sessionCount' in record).toBe(false)
  })

  it('never stores an empty state', () => {
    expect(mergePartials([{ channelStates: { signal: '' } }]).channelStates.signal).toBe('?')
  })

  it('returns a frozen record', () => {
    const record = mergePartials([{ gatewayOk: true }])
    expect(Object.isFrozen(record)).toBe(true)
    expect(Object.isFrozen(record.channelStates)).toBe(true)
  })
})

describe('renderStatusRecord', () => {
  it('renders gateway, tracked channels and sessions', () => {
    expect(renderStatusRecord({
      gatewayOk: true,
      channelStates: { telegram: 'OK', whatsapp: 'DOWN' },
      sessionCount: 3,
    })).toBe('Gateway OK · TG OK · WA DOWN · Sessions 3')
  })

  it('omits sessions when unknown', () => {
    expect(renderStatusRecord({ gatewayOk: false, channelStates: {} })).toBe('Gateway DOWN · TG ? · WA ?')
  })
})
