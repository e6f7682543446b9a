const VALUE_FLAGS = new Set(["--format", "--top"]);

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function getFlagValue(args: string[], name: string): string | null {
  const i = args.indexOf(name);
  return i >= 0 && i < args.length - 1 ? args[i + 1] : null;
}

/** Arguments that are neither flags nor values of value-taking flags. */
export function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (a.startsWith("--")) continue;
    out.push(a);
  }
  return out;
}

/** Flags not understood by the CLI. */
export function unknownFlags(args: string[], known: ReadonlySet<string>): string[] {
  return args.filter((a, i) => a.startsWith("--") && !known.has(a) && !VALUE_FLAGS.has(args[i - 1] ?? ""));
}
