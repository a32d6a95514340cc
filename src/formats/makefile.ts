import type { RawTarget } from "../target/types.js";
import { FormatError, type Format } from "./types.js";

interface Variable {
  value: string;
  /** `=` variables are expanded each time they are referenced. */
  recursive: boolean;
}

interface Rule {
  names: string[];
  prerequisites: string[];
  recipe: string[];
  line: number;
}

/** Values for `$@`, `$<` and `$^` while expanding a recipe. */
interface Automatic {
  target: string;
  prerequisites: string[];
}

interface LogicalLine {
  text: string;
  line: number;
}

const ASSIGNMENT_RE = /^([A-Za-z_][A-Za-z0-9_.-]*)\s*(::=|:=|\?=|\+=|=)\s*(.*)$/;
const REFERENCE_RE = /\$(?:\(([^)]*)\)|\{([^}]*)\}|(.))/g;
const MAX_EXPANSION_DEPTH = 32;

/** Join backslash-continued lines, remembering where each started. */
function logicalLines(source: string): LogicalLine[] {
  const raw = source.split(/\r?\n/);
  const lines: LogicalLine[] = [];
  for (let i = 0; i < raw.length; i++) {
    const line = i + 1;
    let text = raw[i];
    while (text.endsWith("\\") && i + 1 < raw.length) {
      text = `${text.slice(0, -1).trimEnd()} ${raw[++i].trimStart()}`;
    }
    lines.push({ text, line });
  }
  return lines;
}

function stripComment(text: string): string {
  const hash = text.indexOf("#");
  return hash === -1 ? text : text.slice(0, hash);
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/** Drop the `@` that silences echoing; commands are echoed by the updater. */
function unsilenced(command: string): string {
  return command.startsWith("@") ? command.slice(1).trimStart() : command;
}

class MakefileParser {
  private readonly variables = new Map<string, Variable>();
  private readonly phony = new Set<string>();
  private readonly rules: Rule[] = [];
  private current: Rule | undefined;
  private line = 0;

  constructor(private readonly origin: string) {}

  parse(source: string): RawTarget[] {
    for (const { text, line } of logicalLines(source)) {
      this.line = line;
      this.parseLine(text);
    }
    return this.mergedRules().map((rule) => this.toTarget(rule));
  }

  /**
   * Fold rules for the same target into one. Only one of them may carry a
   * recipe; its prerequisites come first so `$<` names its first one.
   */
  private mergedRules(): Rule[] {
    const merged = new Map<string, Rule>();
    for (const rule of this.rules) {
      const existing = merged.get(rule.names[0]);
      if (!existing) {
        merged.set(rule.names[0], { ...rule, names: [...rule.names] });
        continue;
      }

      if (existing.recipe.length > 0 && rule.recipe.length > 0) {
        this.line = rule.line;
        this.fail(`more than one recipe for target "${rule.names[0]}"`);
      }
      const [withRecipe, other] = rule.recipe.length > 0 ? [rule, existing] : [existing, rule];
      existing.prerequisites = [...withRecipe.prerequisites, ...other.prerequisites];
      existing.recipe = withRecipe.recipe;
      for (const name of rule.names) {
        if (!existing.names.includes(name)) existing.names.push(name);
      }
    }
    return [...merged.values()];
  }

  private fail(message: string): never {
    throw new FormatError("makefile", this.origin, message, this.line);
  }

  private parseLine(text: string): void {
    if (text.startsWith("\t")) {
      const command = text.slice(1).trim();
      if (command === "") return;
      if (!this.current) this.fail("recipe commences before first target");
      this.current.recipe.push(command);
      return;
    }

    const content = stripComment(text).trim();
    if (content === "") return;

    const assignment = ASSIGNMENT_RE.exec(content);
    if (assignment) {
      this.assign(assignment[1], assignment[2], assignment[3]);
      this.current = undefined;
      return;
    }

    this.parseRule(content);
  }

  private assign(name: string, operator: string, value: string): void {
    const existing = this.variables.get(name);
    switch (operator) {
      case "=":
        this.variables.set(name, { value, recursive: true });
        break;
      case ":=":
      case "::=":
        this.variables.set(name, { value: this.expand(value), recursive: false });
        break;
      case "?=":
        if (!existing) this.variables.set(name, { value, recursive: true });
        break;
      case "+=":
        if (!existing) {
          this.variables.set(name, { value, recursive: true });
        } else {
          const appended = existing.recursive ? value : this.expand(value);
          this.variables.set(name, {
            value: existing.value === "" ? appended : `${existing.value} ${appended}`,
            recursive: existing.recursive,
          });
        }
        break;
    }
  }

  private parseRule(content: string): void {
    const colon = content.indexOf(":");
    if (colon === -1) this.fail("missing separator");

    const names = words(this.expand(content.slice(0, colon)));
    if (names.length === 0) this.fail("rule has no target");

    // `::` rules are read like single-colon rules
    let rest = content.slice(colon + 1);
    if (rest.startsWith(":")) rest = rest.slice(1);

    const semicolon = rest.indexOf(";");
    const prerequisites = words(this.expand(semicolon === -1 ? rest : rest.slice(0, semicolon)));
    const inlineRecipe = semicolon === -1 ? "" : rest.slice(semicolon + 1).trim();

    if (names[0] === ".PHONY") {
      for (const name of prerequisites) this.phony.add(name);
      this.current = undefined;
      return;
    }
    if (names[0].startsWith(".") && names[0] === names[0].toUpperCase()) {
      // Other special targets (.SUFFIXES, .DEFAULT, ...) have no meaning here
      this.current = undefined;
      return;
    }

    const rule: Rule = { names, prerequisites, recipe: [], line: this.line };
    if (inlineRecipe !== "") rule.recipe.push(inlineRecipe);
    this.rules.push(rule);
    this.current = rule;
  }

  private expand(text: string, automatic?: Automatic, depth = 0): string {
    if (depth > MAX_EXPANSION_DEPTH) {
      this.fail("recursive variable reference");
    }
    return text.replace(REFERENCE_RE, (match, paren?: string, brace?: string, single?: string) => {
      if (single === "$") return "$";
      if (single !== undefined && "@<^".includes(single)) {
        if (!automatic) return match;
        if (single === "@") return automatic.target;
        if (single === "<") return automatic.prerequisites[0] ?? "";
        return [...new Set(automatic.prerequisites)].join(" ");
      }

      const name = (paren ?? brace ?? single ?? "").trim();
      if (/\s/.test(name)) this.fail(`unsupported function "$(${name})"`);

      const variable = this.variables.get(name);
      if (!variable) return "";
      return variable.recursive ? this.expand(variable.value, automatic, depth + 1) : variable.value;
    });
  }

  private toTarget(rule: Rule): RawTarget {
    const [name] = rule.names;
    const automatic: Automatic = { target: name, prerequisites: rule.prerequisites };
    return {
      name,
      outputs: rule.names.filter((n) => !this.phony.has(n)),
      dependencies: { kind: "mixed", names: [...rule.prerequisites] },
      commands: rule.recipe.map((command) => this.expand(unsilenced(command), automatic)),
      extra: { format: "makefile", names: [...rule.names] },
    };
  }
}

/** Parse a Makefile-style build file. Each rule becomes one target. */
export function parseMakefileTargets(source: string, origin: string): RawTarget[] {
  return new MakefileParser(origin).parse(source);
}

export const makefileFormat: Format = {
  name: "makefile",
  fileNames: /^(GNUmakefile|makefile|Makefile)$/,
  parse: parseMakefileTargets,
};
