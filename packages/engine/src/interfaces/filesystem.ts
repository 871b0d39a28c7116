/**
 * Read-only file system view used by the static file handler.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileSystem {
  /** Get file statistics. Rejects when the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /** Read a whole file into memory. */
  readFile(path: string): Promise<Uint8Array>
}
