import type { RawTarget } from "../target/types.js";

export type FormatName = "yaml" | "makefile";

/** A build-file front end. */
export interface Format {
  name: FormatName;
  /** File names this format is picked for when searching a directory. */
  fileNames: RegExp;
  /** Parse a whole build file into raw, not yet finalized, targets. */
  parse(source: string, origin: string): RawTarget[];
}

/** A build file could not be read as its format. */
export class FormatError extends Error {
  readonly format: FormatName;
  readonly origin: string;
  readonly line?: number;

  constructor(format: FormatName, origin: string, message: string, line?: number) {
    super(`${origin}${line !== undefined ? `:${line}` : ""}: ${message}`);
    this.name = "FormatError";
    this.format = format;
    this.origin = origin;
    this.line = line;
  }
}
