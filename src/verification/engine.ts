import nodeProcess from '../adapters/exec/nodeProcess'
import type { ExecAdapter, ExecResult } from '../adapters/exec/interface'
import nodeFs from '../adapters/fs/nodeFs'
import { appendProvenanceEvent, ensureProvenanceFile, newRunId } from '../logging/provenance'
import type { CheckSpec, RunOutcome, RunResult } from './interface'

export type EngineOptions = {
  outputPath: string
  provenancePath?: string
  env?: NodeJS.ProcessEnv
  exec?: ExecAdapter
  now?: () => Date
  debug?: boolean
}

export const ALL_PASSED = 'All checks passed.'
export const SOME_FAILED = 'One or more checks failed.'

/**
 * Run the given checks sequentially, appending a section per check to the output file.
 * A missing or failing tool is recorded and the run continues; only an unwritable output
 * or provenance file rejects, and both are checked before any check runs.
 */
export async function runChecks(checks: readonly CheckSpec[], options: EngineOptions): Promise<RunOutcome> {
  const exec = options.exec ?? nodeProcess
  const now = options.now ?? (() => new Date())
  const env = options.env ?? process.env
  const { outputPath, provenancePath } = options
  const runId = newRunId(now())
  const debug = (...args: unknown[]) => {
    if (options.debug) console.log('[qa-checks]', ...args)
  }

  if (provenancePath) ensureProvenanceFile(provenancePath)
  await nodeFs.write(outputPath, `Quality checks run at ${now().toISOString()}\nOutput file: ${outputPath}\n\n`)

  let failed = false
  for (const check of checks) {
    const commandLine = check.command.join(' ')
    const bin = check.command[0] ?? ''
    await nodeFs.append(outputPath, `==> ${check.name}\nCommand: ${commandLine}\n`)

    const resolved = await exec.resolve(bin, { env })
    let result: RunResult
    let execResult: ExecResult | undefined
    if (resolved === null) {
      debug('missing', bin)
      await nodeFs.append(outputPath, `Result: missing command '${bin}'\n\n`)
      result = { name: check.name, commandLine, found: false }
    } else {
      debug('running', check.name, '->', resolved)
      execResult = await exec.run({ argv: [resolved, ...check.command.slice(1)], outputPath, env })
      if (execResult.code === null) {
        await nodeFs.append(outputPath, `Result: failed to launch '${bin}': ${execResult.error ?? 'unknown error'}\n\n`)
        result = { name: check.name, commandLine, found: true }
      } else {
        await nodeFs.append(outputPath, `Exit code: ${execResult.code}\n\n`)
        result = { name: check.name, commandLine, found: true, exitCode: execResult.code }
      }
    }

    const passed = result.exitCode === 0
    failed = failed || !passed
    debug(check.name, passed ? 'pass' : 'fail')

    if (provenancePath) {
      appendProvenanceEvent(provenancePath, {
        runId,
        name: check.name,
        type: 'qa.check',
        payload: {
          command: check.command,
          commandLine,
          found: result.found,
          exitCode: result.exitCode ?? null,
          signal: execResult?.signal ?? null,
          durationMs: execResult?.durationMs ?? 0,
          error: execResult?.error ?? null
        }
      })
    }
  }

  await nodeFs.append(outputPath, (failed ? SOME_FAILED : ALL_PASSED) + '\n')
  const exitCode = failed ? 1 : 0

  if (provenancePath) {
    appendProvenanceEvent(provenancePath, {
      runId,
      type: 'qa.summary',
      payload: { outputPath, failed, exitCode }
    })
  }

  return { outputPath, failed, exitCode }
}

export default runChecks
