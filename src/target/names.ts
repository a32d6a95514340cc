import type { Target } from "./types.js";

/**
 * Whether `candidate` may be used to refer to `target`.
 *
 * Makefile rules answer to every target word of the rule and YAML targets
 * to their declared aliases; everything else matches its name only.
 */
export function hasName(target: Target, candidate: string): boolean {
  if (target.name === candidate) return true;

  switch (target.extra.format) {
    case "makefile":
      return target.extra.names.includes(candidate);
    case "yaml":
      return target.extra.aliases.includes(candidate);
    case "inline":
      return false;
  }
}

/** Whether the target may be referred to by anything besides its name. */
export function hasAlternateNames(target: Target): boolean {
  switch (target.extra.format) {
    case "makefile":
      return target.extra.names.some((n) => n !== target.name);
    case "yaml":
      return target.extra.aliases.length > 0;
    case "inline":
      return false;
  }
}
