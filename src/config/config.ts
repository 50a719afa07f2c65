import fs from 'fs/promises'
import Ajv from 'ajv'
import checksFileSchema, { CheckSpec } from '../types/checkSchema'

export const DEFAULT_OUTPUT_PATH = 'qa_output.txt'

/** test runner, lint checker, type checker, in the order they run */
export const DEFAULT_CHECKS: readonly CheckSpec[] = [
  { name: 'pytest', command: ['pytest'] },
  { name: 'ruff', command: ['ruff', 'check', '.'] },
  { name: 'ty', command: ['ty', 'check', '.'] }
]

export type RunnerConfig = {
  outputPath: string
  checks: readonly CheckSpec[]
  provenancePath?: string
  debug: boolean
}

const ajv = new Ajv({ allErrors: true })
const validate = ajv.compile(checksFileSchema)

export async function loadChecksFile(filePath: string): Promise<CheckSpec[]> {
  const raw = await fs.readFile(filePath, 'utf8')
  let obj: unknown
  try {
    obj = JSON.parse(raw)
  } catch (err) {
    throw new Error(`checks file ${filePath} is not valid JSON: ${String(err)}`)
  }
  if (!validate(obj)) {
    throw new Error(`checks file ${filePath} is invalid: ` + JSON.stringify(validate.errors))
  }
  return obj.checks
}

/**
 * Resolve runner configuration from positional args and environment.
 * Only the first positional is used; it names the output file.
 */
export async function loadConfig(positionals: string[], env: NodeJS.ProcessEnv = process.env): Promise<RunnerConfig> {
  const outputPath = positionals[0] || DEFAULT_OUTPUT_PATH
  const checks = env.QA_CHECKS_FILE ? await loadChecksFile(env.QA_CHECKS_FILE) : DEFAULT_CHECKS
  return {
    outputPath,
    checks,
    provenancePath: env.QA_PROVENANCE_PATH || undefined,
    debug: !!env.QA_DEBUG
  }
}
