const COMMANDS_WITH_POSITIONALS = new Set(["diff", "explain"]);

// Flags that never take a value, so the token after them stays positional.
const BOOLEAN_FLAGS = new Set([
  "-s",
  "--side-by-side",
  "--no-color",
  "--verbose",
  "-h",
  "--help",
]);

function isOption(token: string) {
  return token.startsWith("-") && token !== "-";
}

function normalizeTail(tokens: readonly string[]) {
  const options: string[] = [];
  const positionals: string[] = [];
  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i] ?? "";
    if (token === "--") {
      positionals.push(...tokens.slice(i + 1));
      break;
    }
    if (!isOption(token)) {
      positionals.push(token);
      continue;
    }
    options.push(token);
    if (token.includes("=") || BOOLEAN_FLAGS.has(token)) {
      continue;
    }
    const next = tokens[i + 1];
    if (next !== undefined && !isOption(next)) {
      options.push(next);
      i += 1;
    }
  }
  return [...options, ...positionals];
}

/**
 * Moves options of `diff` and `explain` ahead of their positional arguments,
 * so `lineweave diff old.txt new.txt --format plain` parses.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  const head = argv.slice(0, 2);
  const rest = argv.slice(2);
  const commandIndex = rest.findIndex((token) => !isOption(token));
  if (!COMMANDS_WITH_POSITIONALS.has(rest[commandIndex] ?? "")) {
    return [...argv];
  }
  const start = commandIndex + 1;
  const tail = normalizeTail(rest.slice(start));
  return [...head, ...rest.slice(0, start), ...tail];
}
