/**
 * Abstract File System Interfaces
 *
 * Read-only view of the files a content source serves. Keeps the engine
 * free of any runtime-specific file API.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /** Open a file for reading. */
  open(path: string): Promise<IFileHandle>

  /** Get file statistics. Rejects when the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /** Resolve symlinks and dot segments to a canonical path. */
  realpath(path: string): Promise<string>
}
