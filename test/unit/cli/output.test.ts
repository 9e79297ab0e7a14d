import { it, expect } from 'vitest'
import { createOutput } from '../../../server/cli/output.js'

function createSinks() {
  const stdout: string[] = []
  const stderr: string[] = []
  const out = createOutput(
    { write: (chunk: string | Uint8Array) => stdout.push(String(chunk)) > 0 },
    { write: (chunk: string | Uint8Array) => stderr.push(String(chunk)) > 0 },
  )
  return { out, stdout, stderr }
}

it('terminates text with a single newline', () => {
  const { out, stdout } = createSinks()
  out.text('one')
  out.text('two\n')
  expect(stdout).toEqual(['one\n', 'two\n'])
})

it('pretty-prints JSON', () => {
  const { out, stdout } = createSinks()
  out.json({ found: true })
  expect(stdout).toEqual(['{\n  "found": true\n}\n'])
})

it('writes error messages to stderr', () => {
  const { out, stdout, stderr } = createSinks()
  out.error(new Error('unknown command: reboot'))
  out.error('plain')
  expect(stderr).toEqual(['unknown command: reboot\n', 'plain\n'])
  expect(stdout).toEqual([])
})
