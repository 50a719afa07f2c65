#!/usr/bin/env node
import main from './cli'

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`qa-checks: ${err instanceof Error ? err.message : String(err)}`)
    process.exitCode = 2
  })
