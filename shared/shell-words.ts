/**
 * POSIX-shell word handling for user-configured command strings
 * (e.g. a terminal entry like `kitty --hold sh -lc {cmd}`).
 */

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/

export class ShellSyntaxError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ShellSyntaxError'
  }
}

/**
 * Split a command string into words.
 * Supports single quotes (literal), double quotes (backslash escapes `"`, `\`, `$`, `` ` ``)
 * and bare backslash escapes. Throws ShellSyntaxError on an unterminated quote.
 */
export function splitShellWords(input: string): string[] {
  const words: string[] = []
  let current = ''
  let inWord = false
  let i = 0

  while (i < input.length) {
    const ch = input[i]

    if (ch === ' ' || ch === '\t' || ch === '\n') {
      if (inWord) {
        words.push(current)
        current = ''
        inWord = false
      }
      i += 1
      continue
    }

    inWord = true

    if (ch === "'") {
      const end = input.indexOf("'", i + 1)
      if (end < 0) throw new ShellSyntaxError('Unterminated single quote')
      current += input.slice(i + 1, end)
      i = end + 1
      continue
    }

    if (ch === '"') {
      i += 1
      let closed = false
      while (i < input.length) {
        const inner = input[i]
        if (inner === '"') {
          closed = true
          i += 1
          break
        }
        if (inner === '\\' && i + 1 < input.length && '"\\$`'.includes(input[i + 1])) {
          current += input[i + 1]
          i += 2
          continue
        }
        current += inner
        i += 1
      }
      if (!closed) throw new ShellSyntaxError('Unterminated double quote')
      continue
    }

    if (ch === '\\') {
      if (i + 1 < input.length) current += input[i + 1]
      i += 2
      continue
    }

    current += ch
    i += 1
  }

  if (inWord) words.push(current)
  return words
}

/** Quote one word so a POSIX shell reads it back verbatim. */
export function quoteShellWord(word: string): string {
  if (!word) return "''"
  if (SAFE_WORD.test(word)) return word
  return `'${word.replace(/'/g, `'"'"'`)}'`
}

export function joinShellWords(words: readonly string[]): string {
  return words.map(quoteShellWord).join(' ')
}
