#!/usr/bin/env node
import {runCli} from '../cli'

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : String(err))
    process.exit(1)
  })
