import fs from 'fs'
import fsp from 'fs/promises'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import { logger } from './logger.js'
import { cleanString } from './utils.js'

const log = logger.child({ component: 'config' })

export const CONFIG_DISPLAY_PATH = '~/.config/claw-launcher/config.json'

export type LauncherConfig = Readonly<{
  dashboardUrl: string
  /** Program reference for the managed CLI: absolute path, ~/path, relative path or bare name. */
  cli: string
  /** Alternate binary names shipped for the same CLI, in search priority order. */
  cliAliases: readonly string[]
  gatewayService: string
  runnerService: string
  /** Terminal command, may include args and a `{cmd}` placeholder. Empty means auto-detect. */
  terminal: string
}>

export const defaultConfig: LauncherConfig = Object.freeze({
  dashboardUrl: 'http://127.0.0.1:18789/',
  cli: 'clawdbot',
  cliAliases: Object.freeze(['clawdbot', 'moltbot', 'openclaw']),
  gatewayService: 'clawdbot-gateway.service',
  runnerService: 'claw-launcher.service',
  terminal: '',
})

const NonBlankString = z.string().transform((value, ctx) => {
  const cleaned = cleanString(value)
  if (!cleaned) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must not be blank' })
    return z.NEVER
  }
  return cleaned
})

const FieldSchemas = {
  dashboardUrl: NonBlankString.pipe(z.string().url()),
  cli: NonBlankString,
  cliAliases: z.array(z.string()).transform((items) => items.map((item) => item.trim()).filter(Boolean)),
  gatewayService: NonBlankString,
  runnerService: NonBlankString,
  terminal: z.string().transform((value) => value.trim()),
} as const

type FieldName = keyof typeof FieldSchemas

// Older config files used snake_case keys.
const LEGACY_KEYS: Partial<Record<FieldName, string>> = {
  dashboardUrl: 'dashboard_url',
  cliAliases: 'cli_aliases',
  gatewayService: 'gateway_service',
  runnerService: 'runner_service',
}

const RawConfigSchema = z.record(z.string(), z.unknown())

export function resolveConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.config', 'claw-launcher', 'config.json')
}

function pickRaw(raw: Record<string, unknown>, field: FieldName): unknown {
  if (raw[field] !== undefined && raw[field] !== null && raw[field] !== '') return raw[field]
  const legacy = LEGACY_KEYS[field]
  return legacy ? raw[legacy] : undefined
}

function parseField<T>(
  raw: Record<string, unknown>,
  field: FieldName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | undefined {
  const value = pickRaw(raw, field)
  if (value === undefined || value === null) return undefined
  const result = schema.safeParse(value)
  if (!result.success) {
    log.warn({ field, issues: result.error.issues.map((issue) => issue.message) }, 'Ignoring invalid config value')
    return undefined
  }
  return result.data
}

/**
 * Build a config from already-decoded JSON. Every field is validated on its own,
 * so one bad value falls back to its default without discarding the rest.
 */
export function parseConfig(input: unknown): LauncherConfig {
  const parsed = RawConfigSchema.safeParse(input)
  if (!parsed.success) {
    log.warn('Config file is not a JSON object; using defaults')
    return defaultConfig
  }
  const raw = parsed.data
  const cliAliases = parseField(raw, 'cliAliases', FieldSchemas.cliAliases)

  return Object.freeze({
    dashboardUrl: parseField(raw, 'dashboardUrl', FieldSchemas.dashboardUrl) ?? defaultConfig.dashboardUrl,
    cli: parseField(raw, 'cli', FieldSchemas.cli) ?? defaultConfig.cli,
    cliAliases: cliAliases ? Object.freeze(cliAliases) : defaultConfig.cliAliases,
    gatewayService: parseField(raw, 'gatewayService', FieldSchemas.gatewayService) ?? defaultConfig.gatewayService,
    runnerService: parseField(raw, 'runnerService', FieldSchemas.runnerService) ?? defaultConfig.runnerService,
    terminal: parseField(raw, 'terminal', FieldSchemas.terminal) ?? defaultConfig.terminal,
  })
}

/** Load the config once. A missing or unreadable file yields the defaults. */
export function loadConfig(configPath: string = resolveConfigPath()): LauncherConfig {
  if (!fs.existsSync(configPath)) return defaultConfig

  try {
    const decoded: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'))
    return parseConfig(decoded)
  } catch (err) {
    log.warn({ err, configPath }, 'Failed to read config; using defaults')
    return defaultConfig
  }
}

export function serializeConfig(config: LauncherConfig): string {
  return JSON.stringify(
    {
      dashboardUrl: config.dashboardUrl,
      cli: config.cli,
      cliAliases: config.cliAliases,
      gatewayService: config.gatewayService,
      runnerService: config.runnerService,
      terminal: config.terminal,
    },
    null,
    2,
  ) + '\n'
}

/** Write the given config to disk if no file exists yet. Returns the file path. */
export async function ensureDefaultConfigFile(
  config: LauncherConfig,
  configPath: string = resolveConfigPath(),
): Promise<string> {
  await fsp.mkdir(path.dirname(configPath), { recursive: true })
  try {
    await fsp.writeFile(configPath, serializeConfig(config), { encoding: 'utf-8', flag: 'wx' })
    log.info({ configPath }, 'Wrote default config')
  } catch (err: unknown) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err
  }
  return configPath
}
