/**
 * T-SQL quoting helpers.
 *
 * Identifiers and file paths in RESTORE / CREATE DATABASE / DBCC statements cannot all be
 * passed as parameters, so they are quoted here instead of being interpolated raw.
 */

/**
 * Quote an identifier the way QUOTENAME() does: [name] with ] doubled
 */
export function quoteName(identifier: string): string {
  if (identifier.length === 0 || identifier.length > 128) {
    throw new Error(`Invalid identifier length: ${identifier.length}`);
  }
  return `[${identifier.replace(/]/g, ']]')}]`;
}

/**
 * Quote a Unicode string literal: N'value' with ' doubled
 */
export function quoteString(value: string): string {
  return `N'${value.replace(/'/g, "''")}'`;
}

/**
 * Render a comma separated list of DISK = N'...' clauses
 */
export function diskList(paths: string[]): string {
  if (paths.length === 0) {
    throw new Error('At least one backup file is required');
  }
  return paths.map(p => `DISK = ${quoteString(p)}`).join(', ');
}
