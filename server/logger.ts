import { AsyncLocalStorage } from 'async_hooks'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'
import pino, { type DestinationStream, type Level } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || 'debug'
const DEFAULT_DEBUG_LOG_FILE = 'launcher-debug.jsonl'
const DEFAULT_DEBUG_LOG_SIZE: SizeString = '10M'
const DEFAULT_DEBUG_LOG_MAX_FILES = 5

type LogContext = {
  actionId?: string
  requestId?: string
  command?: string
}

const logContext = new AsyncLocalStorage<LogContext>()

type SizeString = `${number}B` | `${number}K` | `${number}M` | `${number}G`

type DebugFileStreamOptions = {
  size?: SizeString
  maxFiles?: number
}

function isTestRuntime(envVars: NodeJS.ProcessEnv): boolean {
  return (
    (envVars.NODE_ENV || 'development') === 'test' ||
    envVars.VITEST === 'true' ||
    envVars.VITEST === '1' ||
    envVars.VITEST_POOL_ID !== undefined
  )
}

/** Version of the nearest package.json above this module. */
function readPackageVersion(): string | undefined {
  let dir = path.dirname(fileURLToPath(import.meta.url))
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, 'package.json')
    if (fs.existsSync(candidate)) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'))
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version
        }
      } catch {
        return undefined
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

const appVersion =
  process.env.npm_package_version ||
  process.env.APP_VERSION ||
  (env === 'test' ? undefined : readPackageVersion())

const CONSOLE_LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal']

/**
 * Console threshold. Launcher runs are short and their stderr is often shown to the
 * user, so only warnings reach it unless LOG_CONSOLE_LEVEL says otherwise.
 */
export function resolveConsoleLevel(envVars: NodeJS.ProcessEnv = process.env): Level {
  const requested = envVars.LOG_CONSOLE_LEVEL?.trim().toLowerCase()
  return CONSOLE_LEVELS.find((candidate) => candidate === requested) ?? 'warn'
}

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run(context, fn)
}

export function getLogContext(): LogContext | undefined {
  return logContext.getStore()
}

export function resolveDebugLogPath(
  envVars: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): string | null {
  const explicitPath = envVars.LOG_DEBUG_PATH?.trim()
  if (explicitPath) return path.resolve(explicitPath)
  if (isTestRuntime(envVars)) return null

  const logDirOverride = envVars.CLAW_LAUNCHER_LOG_DIR?.trim()
  const logDir = logDirOverride
    ? path.resolve(logDirOverride)
    : path.join(homeDir, '.local', 'state', 'claw-launcher', 'logs')
  return path.join(logDir, DEFAULT_DEBUG_LOG_FILE)
}

export function createDebugFileStream(filePath: string, options: DebugFileStreamOptions = {}): RotatingFileStream {
  const size = options.size ?? DEFAULT_DEBUG_LOG_SIZE
  const maxFiles = options.maxFiles ?? DEFAULT_DEBUG_LOG_MAX_FILES
  const dir = path.dirname(filePath)
  fs.mkdirSync(dir, { recursive: true })
  return createStream(path.basename(filePath), { path: dir, size, maxFiles })
}

function createPinoOptions() {
  return {
    level,
    base: {
      app: 'claw-launcher',
      env,
      version: appVersion,
    },
    formatters: {
      level(label: string, number: number) {
        return { level: number, severity: label }
      },
    },
    mixin() {
      // pino mutates the object returned by `mixin()`; hand out a fresh copy every call.
      const ctx = logContext.getStore()
      return ctx ? { ...ctx } : {}
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }
}

// stdout belongs to CLI output, so console logging goes to stderr.
function createConsoleStream(shouldPrettyPrint: boolean): DestinationStream {
  if (!shouldPrettyPrint) return pino.destination(2)
  return pino.transport({
    target: 'pino-pretty',
    options: { colorize: true, translateTime: 'SYS:standard', destination: 2 },
  })
}

function attachDebugStreamWarnings(
  stream: RotatingFileStream,
  consoleLogger: pino.Logger,
  filePath: string,
) {
  let warned = false
  const warnOnce = (err: Error, event: string) => {
    if (warned) return
    warned = true
    consoleLogger.warn({ err, filePath, event }, 'Debug log stream issue')
  }
  stream.on('error', (err: Error) => warnOnce(err, 'error'))
  stream.on('warning', (err: Error) => warnOnce(err, 'warning'))
}

export function createLogger(destination?: DestinationStream) {
  if (destination) {
    return pino(createPinoOptions(), destination)
  }

  const shouldPrettyPrint = env !== 'production' && env !== 'test' && process.stderr.isTTY === true
  const consoleStream = createConsoleStream(shouldPrettyPrint)
  const consoleLogger = pino(createPinoOptions(), consoleStream)
  const streams: Array<{ stream: DestinationStream; level: Level }> = [
    { stream: consoleStream, level: resolveConsoleLevel() },
  ]

  const debugLogPath = resolveDebugLogPath()
  if (debugLogPath) {
    try {
      const debugStream = createDebugFileStream(debugLogPath)
      streams.push({ stream: debugStream, level: 'debug' })
      attachDebugStreamWarnings(debugStream, consoleLogger, debugLogPath)
    } catch (err) {
      consoleLogger.warn({ err, filePath: debugLogPath }, 'Debug log file disabled')
    }
  }

  return pino(createPinoOptions(), pino.multistream(streams))
}

export const logger = createLogger()
