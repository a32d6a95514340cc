import { statSync } from "node:fs";
import { resolve } from "node:path";
import type { Timestamp } from "../target/types.js";

/** Filesystem metadata the updater needs. */
export interface FileProbe {
  /**
   * Last-modified time of `path`, or `undefined` if it does not exist.
   * Any other failure is thrown.
   */
  modifiedTime(path: string): Timestamp | undefined;
}

/** Probe backed by `statSync`, resolving relative paths against `cwd`. */
export function createFsProbe(cwd: string = process.cwd()): FileProbe {
  return {
    modifiedTime(path) {
      const stats = statSync(resolve(cwd, path), {
        bigint: true,
        throwIfNoEntry: false,
      });
      return stats?.mtimeNs;
    },
  };
}
