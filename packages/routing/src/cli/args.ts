/**
 * Minimal argv parsing shared by the scripts.
 */

import { UsageError } from "../errors.js";

export interface ParsedArgs {
  positional: string[];
  /** `--name value` pairs, keyed by the flag including its dashes */
  options: Map<string, string>;
  /** Bare `--name` switches */
  flags: Set<string>;
}

/**
 * @param valueOptions - Flags that take the next argument as their value
 * @throws UsageError when a value option is last or followed by another flag
 */
export function parseArgs(argv: string[], valueOptions: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], options: new Map(), flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (valueOptions.includes(arg)) {
      const value = argv[++i];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(arg, "expects a value");
      }
      parsed.options.set(arg, value);
    } else if (arg.startsWith("--")) {
      parsed.flags.add(arg);
    } else {
      parsed.positional.push(arg);
    }
  }

  return parsed;
}
