type Sink = Pick<NodeJS.WritableStream, 'write'>

/** Where command results go. Results on stdout, diagnostics on stderr. */
export type CliOutput = {
  text: (text: string) => void
  json: (data: unknown) => void
  error: (err: unknown) => void
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`
}

export function createOutput(stdout: Sink = process.stdout, stderr: Sink = process.stderr, pretty = true): CliOutput {
  const text = (value: string) => {
    stdout.write(withNewline(value))
  }
  return {
    text,
    json: (data) => text(pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data)),
    error: (err) => {
      stderr.write(withNewline(err instanceof Error ? err.message : String(err)))
    },
  }
}

export const stdioOutput: CliOutput = createOutput()
