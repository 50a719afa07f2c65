import { spawn } from 'child_process'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { ExecAdapter, ExecOptions, ExecResult } from './interface'

async function isExecutableFile(p: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(p)
    if (!stat.isFile()) return false
    await fs.promises.access(p, fs.constants.X_OK)
    return true
  } catch {
    return false
  }
}

/** Shell convention for a child terminated by a signal: 128 + signal number. */
function signalExitCode(signal: NodeJS.Signals): number | null {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal)
  return entry ? 128 + entry[1] : null
}

/**
 * NodeProcess exec adapter
 * Spawns argv directly (no shell) with both output streams appended to a file, and resolves
 * with exit metadata. Launch failures resolve with `error` set rather than rejecting.
 */
const nodeExec: ExecAdapter = {
  async resolve(bin, opts = {}) {
    const cwd = opts.cwd ?? process.cwd()
    if (!bin) return null
    if (bin.includes('/') || bin.includes(path.sep)) {
      const candidate = path.resolve(cwd, bin)
      return (await isExecutableFile(candidate)) ? candidate : null
    }

    const env = opts.env ?? process.env
    // an empty PATH entry means the current directory
    const dirs = env.PATH === undefined ? [] : env.PATH.split(path.delimiter).map((dir) => dir || '.')
    for (const dir of dirs) {
      const candidate = path.resolve(cwd, dir, bin)
      if (await isExecutableFile(candidate)) return candidate
    }
    return null
  },

  async run(opts: ExecOptions): Promise<ExecResult> {
    const { argv, outputPath, cwd, env } = opts
    const [bin, ...args] = argv
    if (!bin) return { code: null, durationMs: 0, signal: null, error: 'empty command' }

    const start = Date.now()
    // open failures reject: the output file is the runner's responsibility
    const handle = await fs.promises.open(outputPath, 'a')

    try {
      return await new Promise<ExecResult>((resolve) => {
        const child = spawn(bin, args, {
          cwd,
          env: env ?? process.env,
          stdio: ['ignore', handle.fd, handle.fd]
        })

        child.on('error', (err) => {
          resolve({ code: null, durationMs: Date.now() - start, signal: null, error: err.message })
        })

        child.on('close', (code, signal) => {
          const durationMs = Date.now() - start
          if (code === null && signal) {
            resolve({ code: signalExitCode(signal), durationMs, signal })
            return
          }
          resolve({ code, durationMs, signal })
        })
      })
    } finally {
      await handle.close()
    }
  }
}

export default nodeExec
