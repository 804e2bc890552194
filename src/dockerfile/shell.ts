const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quote a single argument for /bin/sh. Safe words pass through unchanged. */
export function quoteShellArg(arg: string): string {
  if (arg.length > 0 && SAFE_WORD.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function shellCommand(argv: string[]): string {
  return argv.map(quoteShellArg).join(" ");
}
