/**
 * Quote one argument for a POSIX shell using single quotes. Embedded single quotes
 * are emitted as `\'` outside the quoted runs, so `'bash'` becomes `\''bash'\'`.
 */
export function quoteArg(token: string): string {
  if (token === "") return "''";

  let quoted = "";
  let rest = token;
  for (;;) {
    const i = rest.indexOf("'");
    if (i === -1) {
      if (rest !== "") quoted += `'${rest}'`;
      return quoted;
    }
    if (i > 0) quoted += `'${rest.slice(0, i)}'`;
    quoted += "\\'";
    rest = rest.slice(i + 1);
  }
}

/**
 * Build the shell command line for `args`. If `args[0]` names an alias, the alias
 * literal is used as-is; otherwise `args[0]` is quoted like any other argument.
 */
export function encodeCommand(aliases: Readonly<Record<string, string>>, args: readonly string[]): string {
  const [name, ...rest] = args;
  if (name === undefined) throw new RangeError("a command is required");

  const base = Object.hasOwn(aliases, name) ? aliases[name] : quoteArg(name);
  return [base, ...rest.map(quoteArg)].join(" ");
}
