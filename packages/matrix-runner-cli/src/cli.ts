#!/usr/bin/env node

import { getCliHelpText, parseCliOptions } from './cliOptions.js'
import { CLI_EXIT_CODES, getExitCodeForError } from './exitCodes.js'
import { runCliMatrix } from './runMatrix.js'

const run = async (): Promise<void> => {
  const options = parseCliOptions(process.argv.slice(2), process.cwd())

  if (options.help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    process.exitCode = CLI_EXIT_CODES.success
    return
  }

  process.exitCode = await runCliMatrix(options)
}

void run().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  process.stderr.write(`${message}\n`)
  process.exitCode = getExitCodeForError(error)
})
