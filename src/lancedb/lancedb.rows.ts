/**
 * Helpers for reading rows returned by LanceDB queries, which are untyped
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') {
    throw new TypeError(`LanceDB row field "${key}" is not a string`);
  }
  return value;
}

export function readNumber(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  // Int64 columns come back as bigint
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value !== 'number') {
    throw new TypeError(`LanceDB row field "${key}" is not a number`);
  }
  return value;
}

export function readBoolean(
  row: Record<string, unknown>,
  key: string,
): boolean {
  const value = row[key];
  if (typeof value !== 'boolean') {
    throw new TypeError(`LanceDB row field "${key}" is not a boolean`);
  }
  return value;
}

/**
 * Quote a string for a LanceDB SQL filter
 */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function column(name: string): string {
  return `\`${name}\``;
}
