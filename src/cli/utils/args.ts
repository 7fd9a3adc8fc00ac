/**
 * Minimal argument helpers for command handlers.
 */

/**
 * Whether any of the given flags is present.
 *
 * @param args - Command arguments.
 * @param names - Flag spellings, e.g. `['--verbose', '-v']`.
 */
export function hasFlag(args: readonly string[], names: readonly string[]): boolean {
  return args.some((arg) => names.includes(arg));
}

/**
 * Value of an option given as `--name value` or `--name=value`.
 *
 * @param args - Command arguments.
 * @param names - Option spellings, e.g. `['--output', '-o']`.
 * @returns The last value given, or undefined when the option is absent or
 * has no value.
 */
export function getOptionValue(args: readonly string[], names: readonly string[]): string | undefined {
  let value: string | undefined;
  args.forEach((arg, index) => {
    if (names.includes(arg)) {
      const next = args[index + 1];
      value = next !== undefined && !next.startsWith('-') ? next : undefined;
      return;
    }
    for (const name of names) {
      if (name.startsWith('--') && arg.startsWith(`${name}=`)) {
        value = arg.slice(name.length + 1);
      }
    }
  });
  return value;
}

/**
 * Positional arguments: everything that is not a flag or an option value.
 *
 * @param args - Command arguments.
 * @param valueOptions - Spellings of options that take a value.
 */
export function getPositionals(args: readonly string[], valueOptions: readonly string[] = []): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (valueOptions.includes(arg)) {
      if (args[i + 1]?.startsWith('-') === false) {
        i++;
      }
      continue;
    }
    if (arg.startsWith('-') && arg !== '-') {
      continue;
    }
    positionals.push(arg);
  }
  return positionals;
}
