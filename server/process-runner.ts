import { execFile, spawn } from 'child_process'
import { logger } from './logger.js'

const log = logger.child({ component: 'process-runner' })

const MAX_BUFFER_BYTES = 4 * 1024 * 1024

/**
 * Outcome of a bounded, awaited subprocess call.
 * Timeouts, missing programs and nonzero exits are distinct so callers can word them differently.
 */
export type RunResult =
  | { kind: 'ok'; stdout: string; stderr: string }
  | { kind: 'exit'; code: number; stdout: string; stderr: string }
  | { kind: 'timeout'; timeoutMs: number; stdout: string; stderr: string }
  | { kind: 'not-found'; file: string }
  | { kind: 'error'; message: string }

export type RunOptions = {
  timeoutMs: number
  env?: NodeJS.ProcessEnv
}

export type CommandRunner = (file: string, args: string[], options: RunOptions) => Promise<RunResult>

/** Run a program to completion. Never rejects. */
export const runCommand: CommandRunner = (file, args, options) => {
  return new Promise((resolve) => {
    try {
      execFile(
        file,
        args,
        { timeout: options.timeoutMs, env: options.env, maxBuffer: MAX_BUFFER_BYTES, encoding: 'utf8' },
        (err, stdout, stderr) => {
          if (!err) {
            resolve({ kind: 'ok', stdout, stderr })
            return
          }
          if (err.code === 'ENOENT') {
            resolve({ kind: 'not-found', file })
            return
          }
          if (typeof err.code === 'number') {
            resolve({ kind: 'exit', code: err.code, stdout, stderr })
            return
          }
          // maxBuffer overflow also kills the child, but reports a string code.
          if (err.killed && typeof err.code !== 'string') {
            resolve({ kind: 'timeout', timeoutMs: options.timeoutMs, stdout, stderr })
            return
          }
          resolve({ kind: 'error', message: err.message })
        },
      )
    } catch (err: unknown) {
      resolve({ kind: 'error', message: err instanceof Error ? err.message : String(err) })
    }
  })
}

/** Short human-readable reason for a non-ok result. */
export function describeFailure(result: RunResult): string {
  switch (result.kind) {
    case 'ok':
      return 'ok'
    case 'exit':
      return result.stderr.trim() || result.stdout.trim() || `exited with code ${result.code}`
    case 'timeout':
      return `timed out after ${result.timeoutMs / 1000}s`
    case 'not-found':
      return `${result.file} could not be launched`
    case 'error':
      return result.message
  }
}

export type LaunchResult =
  | { ok: true; pid?: number }
  | { ok: false; error: string }

export type DetachedLauncher = (
  command: string,
  args: string[],
  options?: { env?: NodeJS.ProcessEnv },
) => Promise<LaunchResult>

/**
 * Start a process in its own session and stop tracking it.
 * Resolves once the child has spawned, or with the spawn error.
 */
export const spawnDetached: DetachedLauncher = (command, args, options = {}) => {
  return new Promise((resolve) => {
    try {
      const child = spawn(command, args, { detached: true, stdio: 'ignore', env: options.env })

      const onSpawn = () => {
        child.removeListener('error', onError)
        child.unref()
        log.debug({ command, args, pid: child.pid }, 'Detached process started')
        resolve({ ok: true, pid: child.pid })
      }

      const onError = (err: Error) => {
        child.removeListener('spawn', onSpawn)
        resolve({ ok: false, error: `Failed to launch "${command}": ${err.message}` })
      }

      child.once('spawn', onSpawn)
      child.once('error', onError)
    } catch (err: unknown) {
      resolve({ ok: false, error: err instanceof Error ? err.message : String(err) })
    }
  })
}
