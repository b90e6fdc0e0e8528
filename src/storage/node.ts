/**
 * @file Node.js file system adapter for HTY files
 * All calls are synchronous: an operation opens its file, scans, and releases
 * the descriptor in a `finally` block on every exit path.
 */
import { closeSync, fstatSync, fsyncSync, openSync, readSync, renameSync, rmSync, writeSync } from "node:fs";
import { basename, dirname, join as joinPath } from "node:path";
import type { BlockFile, BlockSink } from "./types";
import { ShortReadError } from "./errors";
import { IOUnavailableError } from "../hty/errors";

/** Open `path` for positional reads. Throws IOUnavailableError when it cannot be opened. */
export function openBlockFile(path: string): BlockFile {
  const fd = (() => {
    try {
      return openSync(path, "r");
    } catch (e) {
      throw new IOUnavailableError(path, "open", e);
    }
  })();
  const size = (() => {
    try {
      return fstatSync(fd).size;
    } catch (e) {
      closeSync(fd);
      throw new IOUnavailableError(path, "stat", e);
    }
  })();
  return {
    path,
    size() {
      return size;
    },
    readAt(position: number, length: number): Uint8Array {
      const out = new Uint8Array(length);
      // eslint-disable-next-line no-restricted-syntax -- readSync may return partial reads
      let got = 0;
      while (got < length) {
        const n = (() => {
          try {
            return readSync(fd, out, got, length - got, position + got);
          } catch (e) {
            throw new IOUnavailableError(path, "read", e);
          }
        })();
        if (n === 0) {
          throw new ShortReadError(position, length, got);
        }
        got += n;
      }
      return out;
    },
    close() {
      closeSync(fd);
    },
  };
}

/** Run `fn` with an open BlockFile and always close it afterwards. */
export function withBlockFile<T>(path: string, fn: (file: BlockFile) => T): T {
  const file = openBlockFile(path);
  try {
    return fn(file);
  } finally {
    file.close();
  }
}

function tempPathFor(path: string): string {
  return joinPath(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
}

function createFdSink(fd: number, path: string): BlockSink {
  // eslint-disable-next-line no-restricted-syntax -- running write position
  let written = 0;
  return {
    write(data: Uint8Array): void {
      // eslint-disable-next-line no-restricted-syntax -- writeSync may write partially
      let off = 0;
      while (off < data.length) {
        try {
          off += writeSync(fd, data, off, data.length - off);
        } catch (e) {
          throw new IOUnavailableError(path, "write", e);
        }
      }
      written += data.length;
    },
    position(): number {
      return written;
    },
  };
}

/**
 * Write a file through a temporary sibling and rename it into place.
 * Why: the destination is either untouched or fully written, never partial.
 */
export function writeFileAtomic<T>(path: string, produce: (sink: BlockSink) => T): T {
  const tmp = tempPathFor(path);
  const fd = (() => {
    try {
      return openSync(tmp, "w");
    } catch (e) {
      throw new IOUnavailableError(path, "create", e);
    }
  })();
  try {
    const result = (() => {
      try {
        const produced = produce(createFdSink(fd, path));
        fsyncSync(fd);
        return produced;
      } finally {
        closeSync(fd);
      }
    })();
    try {
      renameSync(tmp, path);
    } catch (e) {
      throw new IOUnavailableError(path, "rename into", e);
    }
    return result;
  } catch (error) {
    rmSync(tmp, { force: true });
    throw error;
  }
}
