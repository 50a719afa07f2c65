import fs from 'fs'
import { FsAdapter } from './interface'

/**
 * NodeFs: utf8 write/append over fs.promises. Errors (missing directory, permissions)
 * reject unchanged so callers can treat an unwritable log as fatal.
 */
const nodeFs: FsAdapter = {
  async write(p: string, content: string): Promise<void> {
    await fs.promises.writeFile(p, content, { encoding: 'utf8', flag: 'w' })
  },

  async append(p: string, content: string): Promise<void> {
    await fs.promises.appendFile(p, content, { encoding: 'utf8' })
  }
}

export default nodeFs
