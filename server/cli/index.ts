#!/usr/bin/env node
import { runCli } from './run.js'
import { stdioOutput } from './output.js'

async function main() {
  process.exitCode = await runCli(process.argv.slice(2))
}

main().catch((err) => {
  stdioOutput.error(err)
  process.exitCode = 1
})
