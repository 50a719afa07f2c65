export interface FsAdapter {
  /** Create or truncate `path` and write `content`. Parent directories are not created. */
  write(path: string, content: string): Promise<void>
  append(path: string, content: string): Promise<void>
}
