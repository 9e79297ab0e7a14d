import { describe, it, expect, vi } from 'vitest'
import type { ResolvedExecutable } from '../../../../server/executable-resolver.js'
import type { CommandRunner, RunResult } from '../../../../server/process-runner.js'
import {
  collectStatus,
  notFoundMessage,
  parsePlainStatus,
  parseStructuredStatus,
  summarizeStatus,
} from '../../../../server/status/status-normalizer.js'
import { verboseStatusCommand } from '../../../../server/status/status-command.js'

const CLI: ResolvedExecutable = { absolutePath: '/opt/claw/bin/clawdbot', found: true, configuredAs: 'clawdbot' }

const STRUCTURED = JSON.stringify({
  gateway: { state: 'ok' },
  channels: [
    { channel: 'telegram', state: 'up' },
    { channel: 'whatsapp', state: 'down' },
  ],
  sessions: { active: 3 },
})

function ok(stdout: string): RunResult {
  return { kind: 'ok', stdout, stderr: '' }
}

function exit(code: number, stderr = ''): RunResult {
  return { kind: 'exit', code, stdout: '', stderr }
}

function scriptedRunner(responses: Record<string, RunResult>) {
  return vi.fn<CommandRunner>(async (_file, args) => responses[args.join(' ')] ?? exit(2, 'unknown option'))
}

describe('summarizeStatus', () => {
  it('summarizes structured JSON output', async () => {
    const run = scriptedRunner({ 'status --json': ok(STRUCTURED) })
    expect(await summarizeStatus(CLI, { run })).toBe('Gateway OK · TG OK · WA DOWN · Sessions 3')
    expect(run).toHaveBeenCalledTimes(1)
    expect(run).toHaveBeenCalledWith('/opt/claw/bin/clawdbot', ['status', '--json'], { timeoutMs: 8000 })
  })

  it('tries the JSON forms in order before plain text', async () => {
    const run = scriptedRunner({ status: ok('Gateway: OK\nTelegram: OK\nWhatsApp: OK\n') })
    expect(await summarizeStatus(CLI, { run })).toBe('Gateway OK · TG OK · WA OK')
    expect(run.mock.calls.map((call) => call[1])).toEqual([
      ['status', '--json'],
      ['status', '--format', 'json'],
      ['status'],
    ])
    expect(run.mock.calls[2][2]).toEqual({ timeoutMs: 4000 })
  })

  it('moves on when a JSON form prints something that is not an object', async () => {
    const run = scriptedRunner({
      'status --json': ok('not json'),
      'status --format json': ok(STRUCTURED),
    })
    expect(await summarizeStatus(CLI, { run })).toBe('Gateway OK · TG OK · WA DOWN · Sessions 3')
  })

  it('moves on when a JSON form has none of the status fields', async () => {
    const run = scriptedRunner({
      'status --json': ok('{"error":"unknown option"}'),
      status: ok('Gateway: OK\nTelegram: UP\nWhatsApp: DOWN\nSessions: 2'),
    })
    expect(await summarizeStatus(CLI, { run })).toBe('Gateway OK · TG OK · WA DOWN · Sessions 2')
    expect(run).toHaveBeenCalledTimes(3)
  })

  it('reports a qualified gateway state as down on both paths', async () => {
    const structured = scriptedRunner({ 'status --json': ok('{"gateway":{"state":"running degraded"}}') })
    expect(await summarizeStatus(CLI, { run: structured })).toBe('Gateway DOWN · TG ? · WA ?')

    const plain = scriptedRunner({ status: ok('Gateway: running degraded') })
    expect(await summarizeStatus(CLI, { run: plain })).toBe('Gateway DOWN · TG ? · WA ?')
  })

  it('fills unresolved channels from table rows in plain output', async () => {
    const plain = [
      'Gateway: running',
      'Telegram: ok',
      '│ WhatsApp │ ON │ OK │ linked │',
      'Sessions: 1',
    ].join('\n')
    const run = scriptedRunner({ status: ok(plain) })
    expect(await summarizeStatus(CLI, { run })).toBe('Gateway OK · TG OK · WA OK · Sessions 1')
  })

  it('is idempotent for identical output', async () => {
    const run = scriptedRunner({ 'status --json': ok(STRUCTURED) })
    const first = await summarizeStatus(CLI, { run })
    const second = await summarizeStatus(CLI, { run })
    expect(second).toBe(first)
  })

  it('explains a missing executable without running anything', async () => {
    const run = scriptedRunner({})
    const missing: ResolvedExecutable = { absolutePath: 'clawdbot', found: false, configuredAs: '~/bin/clawdbot' }
    expect(await summarizeStatus(missing, { run })).toBe(
      "CLI not found (~/bin/clawdbot). Set 'cli' in ~/.config/claw-launcher/config.json",
    )
    expect(run).not.toHaveBeenCalled()
  })

  it('reports the plain-form failure when every form fails', async () => {
    const timeout: RunResult = { kind: 'timeout', timeoutMs: 4000, stdout: '', stderr: '' }
    const run = scriptedRunner({ status: timeout })
    expect(await summarizeStatus(CLI, { run })).toBe('Status: timed out after 4s')
  })

  it('reports stderr from a failed plain form', async () => {
    const run = scriptedRunner({ status: exit(1, 'gateway token missing\n') })
    expect(await summarizeStatus(CLI, { run })).toBe('Status: gateway token missing')
  })
})

describe('collectStatus', () => {
  it('tags the record source', async () => {
    const json = await collectStatus(CLI, { run: scriptedRunner({ 'status --json': ok(STRUCTURED) }) })
    expect(json.kind === 'record' && json.source).toBe('json')

    const text = await collectStatus(CLI, { run: scriptedRunner({ status: ok('Gateway: OK') }) })
    expect(text.kind === 'record' && text.source).toBe('text')
  })

  it('passes custom timeouts through', async () => {
    const run = scriptedRunner({ status: ok('') })
    await collectStatus(CLI, { run, structuredTimeoutMs: 100, plainTimeoutMs: 50 })
    expect(run.mock.calls.map((call) => call[2].timeoutMs)).toEqual([100, 100, 50])
  })
})

describe('notFoundMessage', () => {
  it('falls back to the path when nothing was configured', () => {
    expect(notFoundMessage({ absolutePath: 'clawdbot', found: false, configuredAs: '' }))
      .toBe("CLI not found (clawdbot). Set 'cli' in ~/.config/claw-launcher/config.json")
  })
})

describe('parseStructuredStatus', () => {
  it('rejects objects without known status fields', () => {
    expect(parseStructuredStatus('{"error":"unknown option"}')).toBeNull()
    expect(parseStructuredStatus('{}')).toBeNull()
  })

  it('accepts a document with any known field', () => {
    expect(parseStructuredStatus('{"sessionCount":1}')).toEqual({
      gatewayOk: false,
      channelStates: { telegram: '?', whatsapp: '?' },
      sessionCount: 1,
    })
  })
})

describe('parsePlainStatus', () => {
  it('does not let table rows override label lines', () => {
    const text = 'Telegram: down\nWhatsApp: ok\n│ Telegram │ ON │ OK │ x │'
    expect(parsePlainStatus(text).channelStates).toEqual({ telegram: 'DOWN', whatsapp: 'OK' })
  })
})

describe('verboseStatusCommand', () => {
  it('uses status --all when the probe succeeds', async () => {
    const run = scriptedRunner({ 'status --all': ok('') })
    expect(await verboseStatusCommand(CLI, run)).toEqual(['/opt/claw/bin/clawdbot', 'status', '--all'])
    expect(run).toHaveBeenCalledWith('/opt/claw/bin/clawdbot', ['status', '--all'], { timeoutMs: 1500 })
  })

  it('falls back to plain status', async () => {
    const run = scriptedRunner({})
    expect(await verboseStatusCommand(CLI, run)).toEqual(['/opt/claw/bin/clawdbot', 'status'])
  })
})
