/**
 * Declarative CLI argument parser shared by the fwgrab commands.
 *
 * Flags are described once as {@link ArgDef} entries; the same table drives
 * parsing, selection-rule checks and the generated help text.
 */

/**
 * Value type of a flag; "boolean" flags take no value.
 */
export type ArgType = "string" | "boolean";

/**
 * Argument definition for CLI parsing
 */
export interface ArgDef {
  /** Full argument name (e.g., "--download-path") */
  name: string;
  /** Short alias (e.g., "-p") */
  alias?: string;
  type: ArgType;
  /** Description for help text */
  description: string;
  /** Long names of flags that may not be combined with this one */
  conflicts?: string[];
}

export interface ParseResult<T> {
  options: T;
  errors: string[];
  helpRequested: boolean;
}

export interface ParseOptions {
  /**
   * Groups of long flag names of which exactly one must be given.
   */
  requireOneOf?: string[][];
}

const HELP_DEF: ArgDef = {
  name: "--help",
  alias: "-h",
  type: "boolean",
  description: "Show this message and exit"
};

function createFlagMap(defs: ArgDef[]): Map<string, ArgDef> {
  const map = new Map<string, ArgDef>();
  for (const def of defs) {
    map.set(def.name, def);
    if (def.alias) {
      map.set(def.alias, def);
    }
  }
  return map;
}

/** "--download-path" becomes "downloadPath". */
export function getOptionKey(def: Pick<ArgDef, "name">): string {
  return def.name
    .replace(/^-+/, "")
    .replace(/-([a-z])/g, (_, char: string) => char.toUpperCase());
}

function describeFlag(def: ArgDef): string {
  return def.alias ? `${def.name}/${def.alias}` : def.name;
}

function checkSelectionRules(
  defs: ArgDef[],
  seen: Set<string>,
  parseOptions: ParseOptions
): string[] {
  const byName = new Map(defs.map((def) => [def.name, def]));
  const conflicts = new Set<string>();

  for (const name of seen) {
    const def = byName.get(name);
    for (const other of def?.conflicts ?? []) {
      if (seen.has(other)) {
        const [first, second] = [name, other].sort();
        conflicts.add(`${first} cannot be used together with ${second}`);
      }
    }
  }

  const errors = [...conflicts];

  for (const group of parseOptions.requireOneOf ?? []) {
    const present = group.filter((name) => seen.has(name));
    if (present.length === 0) {
      const labels = group.map((name) => {
        const def = byName.get(name);
        return def ? describeFlag(def) : name;
      });
      errors.push(`One of ${labels.join(", ")} is required`);
    } else if (present.length > 1 && conflicts.size === 0) {
      errors.push(`Only one of ${present.join(", ")} may be given`);
    }
  }

  return errors;
}

/**
 * Parse CLI arguments according to the provided definitions.
 *
 * @param argv CLI arguments without the runtime and script path
 * @returns Parsed options keyed by camel-cased long name, plus any errors
 */
export function parseArgs<T>(
  argv: string[],
  defs: ArgDef[],
  parseOptions: ParseOptions = {}
): ParseResult<T> {
  const flagMap = createFlagMap(defs);
  const options: Record<string, unknown> = {};
  const errors: string[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (token === HELP_DEF.name || token === HELP_DEF.alias) {
      return { options: options as T, errors: [], helpRequested: true };
    }

    if (!token.startsWith("-")) {
      errors.push(`Unexpected argument: ${token}`);
      continue;
    }

    const def = flagMap.get(token);
    if (!def) {
      errors.push(`Unknown option: ${token}`);
      continue;
    }

    seen.add(def.name);
    const key = getOptionKey(def);

    if (def.type === "boolean") {
      options[key] = true;
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("-")) {
      errors.push(`${def.name} requires a value`);
      continue;
    }
    options[key] = value;
    i++;
  }

  errors.push(...checkSelectionRules(defs, seen, parseOptions));

  return {
    options: options as T,
    errors,
    helpRequested: false
  };
}

/**
 * Format help text from argument definitions.
 */
export function formatHelp(
  usage: string,
  description: string,
  defs: ArgDef[],
  examples?: string[]
): string {
  const lines: string[] = [
    `Usage: ${usage}`,
    "",
    description,
    "",
    "Options:"
  ];

  const flagLabel = (def: ArgDef): string => {
    const parts: string[] = [];
    if (def.alias) {
      parts.push(`${def.alias},`);
    }
    parts.push(def.name);
    if (def.type !== "boolean") {
      parts.push("<value>");
    }
    return parts.join(" ");
  };

  const all = [HELP_DEF, ...defs];
  const width = Math.max(...all.map((def) => flagLabel(def).length));

  for (const def of all) {
    lines.push(`  ${flagLabel(def).padEnd(width)}  ${def.description}`);
  }

  if (examples && examples.length > 0) {
    lines.push("");
    lines.push("Examples:");
    for (const example of examples) {
      lines.push(`  ${example}`);
    }
  }

  lines.push("");
  return lines.join("\n");
}

/**
 * Writes help or errors for a parse result.
 *
 * @returns Exit code: 0 for help, 1 for errors, undefined to continue
 */
export function handleParseResult<T>(
  result: ParseResult<T>,
  helpText: string,
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr
): number | undefined {
  if (result.helpRequested) {
    stdout.write(helpText);
    return 0;
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      stderr.write(`${error}\n`);
    }
    stderr.write("Use --help to list supported options.\n");
    return 1;
  }

  return undefined;
}
