#!/usr/bin/env node

import { getCliHelpText, parseCliOptions } from './cliOptions.js'
import { runSampleCheck } from './runSampleCheck.js'

const run = async (): Promise<void> => {
  const options = parseCliOptions(process.argv.slice(2), process.cwd())

  if (options.help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    process.exitCode = 0
    return
  }

  const result = await runSampleCheck(options)
  process.exitCode = result.exitCode
}

void run().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  process.stderr.write(`${message}\n`)
  process.exitCode = 1
})
