/**
 * Shell helpers for the "enter" script a tool leaves in its run directory.
 */

const SAFE_SHELL_CHARS = /^[\w@%+=:,./-]+$/;

/** POSIX single-quote `value` unless it is made only of safe characters. */
export function shellQuote(value: string): string {
  if (value === "") return "''";
  if (SAFE_SHELL_CHARS.test(value)) return value;
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Escape an env var value for an `export` line. Plain values are wrapped in
 * double quotes for readability (`export X="9"` rather than `export X=9`).
 */
export function escapeEnvValue(value: string, raw = false): string {
  if (raw) return value;
  if (value === "") return '""';
  const quoted = shellQuote(value);
  return quoted === value ? `"${value}"` : quoted;
}

/** One `export KEY=VALUE` line per variable, sorted by key. */
export function formatEnterScript(env: Record<string, string>, raw = false): string {
  return Object.keys(env)
    .sort()
    .map((key) => `export ${key}=${escapeEnvValue(env[key] ?? "", raw)}`)
    .join("\n");
}
