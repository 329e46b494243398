import type { IFileSystem } from "../interfaces/filesystem.js";
import type { ContentSource } from "./content-source.js";

const READ_CHUNK_SIZE = 64 * 1024; // 64KB

export interface FileSystemContentSourceOptions {
  root: string;
  fs: IFileSystem;
}

/** Serves regular files under `root`. Anything resolving outside it is NotFound. */
export class FileSystemContentSource implements ContentSource {
  private root: string;
  private fs: IFileSystem;
  private realRoot: Promise<string> | null = null;

  constructor(options: FileSystemContentSourceOptions) {
    this.root = options.root.replace(/\/+$/, "");
    this.fs = options.fs;
  }

  async lookup(path: string): Promise<Uint8Array | null> {
    const fsPath = this.root + path;
    if (!(await this.fs.exists(fsPath))) {
      return null;
    }

    // Symlinks may point anywhere; only their target decides containment
    const realPath = await this.fs.realpath(fsPath);
    const realRoot = await this.resolveRoot();
    const prefix = realRoot.endsWith("/") ? realRoot : `${realRoot}/`;
    if (!realPath.startsWith(prefix)) {
      return null;
    }

    const stat = await this.fs.stat(realPath);
    if (!stat.isFile) {
      return null;
    }

    return this.readAll(realPath, stat.size);
  }

  private async resolveRoot(): Promise<string> {
    this.realRoot ??= this.fs.realpath(this.root || "/");
    const pending = this.realRoot;
    try {
      return await pending;
    } catch (err) {
      // Retry on the next lookup instead of failing forever
      if (this.realRoot === pending) {
        this.realRoot = null;
      }
      throw err;
    }
  }

  private async readAll(filePath: string, size: number): Promise<Uint8Array> {
    const data = new Uint8Array(size);
    const handle = await this.fs.open(filePath);
    try {
      let position = 0;
      while (position < size) {
        const toRead = Math.min(READ_CHUNK_SIZE, size - position);
        const { bytesRead } = await handle.read(data, position, toRead, position);
        if (bytesRead === 0) break;
        position += bytesRead;
      }
      return position === size ? data : data.slice(0, position);
    } finally {
      await handle.close();
    }
  }
}
