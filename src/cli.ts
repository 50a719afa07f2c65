import { loadConfig } from './config/config'
import { runChecks } from './verification/engine'

export const HELP_TEXT = `Usage: qa-checks [output_path]

Runs the configured test, lint and type checks in order and writes their
combined output to output_path (default: qa_output.txt).

Environment:
  QA_CHECKS_FILE       JSON file ({ "checks": [{ "name", "command": [...] }] }) replacing the default checks
  QA_PROVENANCE_PATH   append JSONL provenance events to this file
  QA_DEBUG             print debug tracing to the console

Exit codes: 0 all checks passed, 1 a check failed or was missing, 2 fatal error.`

/**
 * Parse argv, run the checks and return the process exit code.
 * Configuration and output-file errors reject; the bin entry turns them into exit code 2.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    // eslint-disable-next-line no-console
    console.log(HELP_TEXT)
    return 0
  }

  const config = await loadConfig(argv, env)
  const outcome = await runChecks(config.checks, {
    outputPath: config.outputPath,
    provenancePath: config.provenancePath,
    debug: config.debug,
    env
  })
  return outcome.exitCode
}

export default main
