type FlagMatch = { kind: "absent" } | { kind: "bare" } | { kind: "valued"; value: string };

// Accepts `--name=value`, `--name value` and a bare `--name`.
function findFlag(argv: readonly string[], name: string): FlagMatch {
  const flag = `--${name}`;

  for (const [i, token] of argv.entries()) {
    if (token.startsWith(`${flag}=`)) {
      return { kind: "valued", value: token.slice(flag.length + 1) };
    }
    if (token !== flag) {
      continue;
    }

    const next = argv[i + 1];
    return next === undefined || next.startsWith("--") ? { kind: "bare" } : { kind: "valued", value: next };
  }

  return { kind: "absent" };
}

export function getArg(argv: readonly string[], name: string): string | undefined {
  const match = findFlag(argv, name);
  switch (match.kind) {
    case "absent":
      return undefined;
    case "bare":
      throw new Error(`Expected value after --${name}`);
    case "valued":
      return match.value;
  }
}

export function hasFlag(argv: readonly string[], name: string): boolean {
  return findFlag(argv, name).kind !== "absent";
}

export function getIntegerArg(argv: readonly string[], name: string, range: { min: number; max: number }): number | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
    throw new Error(`--${name} must be an integer in [${range.min}, ${range.max}], got '${raw}'`);
  }
  return parsed;
}
