const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/

/**
 * Quote a single argument for bash. Safe words pass through untouched;
 * everything else is single-quoted with embedded quotes spliced as '\''.
 */
export function shellQuote(arg: string): string {
  if (arg === '') return "''"
  if (SAFE_WORD.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

export function shellJoin(argv: string[]): string {
  return argv.map(shellQuote).join(' ')
}
