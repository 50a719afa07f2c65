import type { CheckSpec } from '../types/checkSchema'

export type { CheckSpec }

export type RunResult = {
  name: string
  commandLine: string
  found: boolean
  exitCode?: number
}

export type RunOutcome = {
  outputPath: string
  /** aggregate status: true when any check was missing or failed */
  failed: boolean
  exitCode: 0 | 1
}
