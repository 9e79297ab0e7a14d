import { describe, it, expect } from 'vitest'
import { joinShellWords, quoteShellWord, ShellSyntaxError, splitShellWords } from '../../../shared/shell-words.js'

describe('splitShellWords', () => {
  it('splits on whitespace', () => {
    expect(splitShellWords('  kitty  --hold\tsh -lc ')).toEqual(['kitty', '--hold', 'sh', '-lc'])
  })

  it('keeps single-quoted text literal', () => {
    expect(splitShellWords(`sh -c 'echo "$HOME" \\n'`)).toEqual(['sh', '-c', 'echo "$HOME" \\n'])
  })

  it('handles escapes inside double quotes', () => {
    expect(splitShellWords('say "a \\"b\\" \\$c \\d"')).toEqual(['say', 'a "b" $c \\d'])
  })

  it('joins adjacent quoted segments into one word', () => {
    expect(splitShellWords(`a'b c'"d"e`)).toEqual(['ab cde'])
  })

  it('treats a bare backslash as an escape', () => {
    expect(splitShellWords('one\\ word two')).toEqual(['one word', 'two'])
  })

  it('keeps empty quoted words', () => {
    expect(splitShellWords(`x '' y`)).toEqual(['x', '', 'y'])
  })

  it('throws on unterminated quotes', () => {
    expect(() => splitShellWords(`echo 'oops`)).toThrow(ShellSyntaxError)
    expect(() => splitShellWords('echo "oops')).toThrow('Unterminated double quote')
  })
})

describe('quoteShellWord', () => {
  it('leaves safe words alone', () => {
    expect(quoteShellWord('clawdbot-gateway.service')).toBe('clawdbot-gateway.service')
    expect(quoteShellWord('/usr/bin/env')).toBe('/usr/bin/env')
  })

  it('quotes empty words', () => {
    expect(quoteShellWord('')).toBe("''")
  })

  it('single-quotes words with spaces or metacharacters', () => {
    expect(quoteShellWord('a b')).toBe("'a b'")
    expect(quoteShellWord('$HOME')).toBe("'$HOME'")
  })

  it('escapes embedded single quotes', () => {
    expect(quoteShellWord("it's")).toBe(`'it'"'"'s'`)
  })

  it('round-trips through splitShellWords', () => {
    const words = ['echo', "it's", 'a "test"', '', '$x']
    expect(splitShellWords(joinShellWords(words))).toEqual(words)
  })
})

describe('joinShellWords', () => {
  it('joins quoted words with spaces', () => {
    expect(joinShellWords(['journalctl', '--user', '-u', 'my unit', '-f'])).toBe("journalctl --user -u 'my unit' -f")
  })
})
