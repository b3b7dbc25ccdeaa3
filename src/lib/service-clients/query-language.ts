/**
 * Helpers shared by JQL and CQL, which use the same quoting rules
 */

/**
 * Escape a value for use inside a double-quoted JQL/CQL string
 */
export function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * `field op "a" OR field op "b"`; empty values are skipped
 */
export function anyOf(field: string, operator: '~' | '=', values: readonly string[]): string {
  return values
    .filter((value) => value.length > 0)
    .map((value) => `${field} ${operator} ${quote(value)}`)
    .join(' OR ');
}

/**
 * AND together clauses, parenthesizing each; empty clauses are dropped
 */
export function allOf(clauses: readonly string[]): string {
  const present = clauses.filter((clause) => clause.length > 0);
  if (present.length === 1) return present[0];
  return present.map((clause) => `(${clause})`).join(' AND ');
}

/**
 * Keep the first occurrence of every id, preserving order
 */
export function dedupeById<T extends { id: string }>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    unique.push(item);
  }
  return unique;
}

/**
 * Case-insensitive allowlist check against any of an item's identifiers
 */
export function inAllowlist(allowlist: readonly string[], identifiers: readonly (string | undefined)[]): boolean {
  if (allowlist.length === 0) return true;
  const allowed = new Set(allowlist.map((entry) => entry.toLowerCase()));
  return identifiers.some((identifier) => identifier !== undefined && allowed.has(identifier.toLowerCase()));
}
