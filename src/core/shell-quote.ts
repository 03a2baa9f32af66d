const SAFE_WORD = /^[A-Za-z0-9@%+=:,./_-]+$/;

/** POSIX single-quote escaping; words made only of safe characters pass through. */
export function shellQuote(value: string): string {
  if (value.length === 0) {
    return "''";
  }
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replaceAll("'", `'"'"'`)}'`;
}

/**
 * Quotes a value that may start with `${variable}/`, leaving the variable
 * outside the quotes so the shell still expands it.
 */
export function shellQuoteExpanding(value: string, variable: string): string {
  if (!value.startsWith(`${variable}/`)) {
    return shellQuote(value);
  }
  return `"${variable}"${shellQuote(value.slice(variable.length))}`;
}

/** Bash array literal: `( a b c )`. */
export function shellArray(words: string[]): string {
  return words.length === 0 ? "( )" : `( ${words.join(" ")} )`;
}

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isShellVariableName(name: string): boolean {
  return VARIABLE_NAME.test(name);
}
