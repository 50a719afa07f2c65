export type ExecOptions = {
  /** argv; the first token is the executable */
  argv: string[]
  /** stdout and stderr are both appended to this file */
  outputPath: string
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export type ExecResult = {
  code: number | null
  durationMs: number
  signal?: NodeJS.Signals | null
  error?: string
}

export interface ExecAdapter {
  /** Locate an executable the way a POSIX shell would; null when it cannot be found. */
  resolve(bin: string, opts?: { cwd?: string; env?: NodeJS.ProcessEnv }): Promise<string | null>
  run(opts: ExecOptions): Promise<ExecResult>
}
