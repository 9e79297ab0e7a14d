import path from 'path'
import { logger } from '../logger.js'
import { isOnPath } from '../platform-utils.js'
import { quoteShellWord, splitShellWords } from '../../shared/shell-words.js'

const log = logger.child({ component: 'terminal-argv' })

export const COMMAND_PLACEHOLDER = '{cmd}'

/** Probed in order when neither config nor $TERMINAL name one. */
export const TERMINAL_CANDIDATES: readonly string[] = [
  // Debian/Ubuntu alternative; follows update-alternatives
  'x-terminal-emulator',
  'kitty',
  'alacritty',
  'konsole',
  'gnome-terminal',
  'xterm',
]

export type TerminalInvocation = Readonly<{
  program: string
  /** Full argv; `argv[0]` is `program`. */
  argv: readonly string[]
}>

export type TerminalLookupOptions = {
  env?: NodeJS.ProcessEnv
  isAvailable?: (name: string) => boolean
}

type TrailingArgs = (shellCommand: string) => string[]

const genericTrailingArgs: TrailingArgs = (cmd) => ['-e', 'sh', '-lc', cmd]

// Keyed by executable base name. Anything else gets the generic `-e` convention.
const EMULATOR_ARGS: Readonly<Record<string, TrailingArgs>> = {
  kitty: (cmd) => ['--hold', 'sh', '-lc', cmd],
  konsole: (cmd) => ['--hold', '-e', 'sh', '-lc', cmd],
  xterm: (cmd) => ['-hold', '-e', 'sh', '-lc', cmd],
  'gnome-terminal': (cmd) => ['--', 'bash', '-lc', cmd],
}

/** Run `command`, then drop into an interactive login shell so the window stays open. */
export function keepOpenCommand(command: string): string {
  return `${command}; echo; exec "\${SHELL:-bash}" -l`
}

/**
 * Pick the terminal command string (may carry args).
 * Precedence: configured value, then $TERMINAL, then the first installed candidate.
 * Returns an empty string when nothing is available.
 */
export function resolveTerminalReference(configured: string, options: TerminalLookupOptions = {}): string {
  const fromConfig = configured.trim()
  if (fromConfig) return fromConfig

  const env = options.env ?? process.env
  const fromEnv = (env.TERMINAL ?? '').trim()
  if (fromEnv) return fromEnv

  const isAvailable = options.isAvailable ?? ((name: string) => isOnPath(name, env))
  return TERMINAL_CANDIDATES.find((name) => isAvailable(name)) ?? ''
}

function splitReference(reference: string): string[] {
  try {
    return splitShellWords(reference)
  } catch (err) {
    log.warn({ err, reference }, 'Cannot parse terminal command')
    return []
  }
}

/**
 * Build the argv that runs `shellCommand` inside `terminalCommand`.
 * A `{cmd}` placeholder receives the command as one quoted shell word and the rest
 * of the string is used verbatim. Returns [] for an empty or unparseable terminal.
 */
export function buildTerminalArgv(terminalCommand: string, shellCommand: string): string[] {
  if (!terminalCommand.trim()) return []

  if (terminalCommand.includes(COMMAND_PLACEHOLDER)) {
    return splitReference(terminalCommand.split(COMMAND_PLACEHOLDER).join(quoteShellWord(shellCommand)))
  }

  const term = splitReference(terminalCommand)
  if (term.length === 0) return []

  const baseName = path.basename(term[0])
  const trailing = Object.hasOwn(EMULATOR_ARGS, baseName) ? EMULATOR_ARGS[baseName] : genericTrailingArgs
  return [...term, ...trailing(shellCommand)]
}

/**
 * Resolve a terminal and build the invocation for `shellCommand`, wrapped so the
 * window stays open. Returns null when no terminal can be determined.
 */
export function buildTerminalInvocation(
  terminalReference: string,
  shellCommand: string,
  options: TerminalLookupOptions = {},
): TerminalInvocation | null {
  const terminal = resolveTerminalReference(terminalReference, options)
  if (!terminal) return null

  const argv = buildTerminalArgv(terminal, keepOpenCommand(shellCommand))
  if (argv.length === 0) return null
  return Object.freeze({ program: argv[0], argv: Object.freeze(argv) })
}
