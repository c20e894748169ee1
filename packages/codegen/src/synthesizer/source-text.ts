/**
 * Helpers for writing TypeScript source text
 */

const IDENTIFIER_PATTERN = /^[$A-Z_a-z][\w$]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Single-quoted string literal
 */
export function quote(value: string): string {
  const escaped = value
    .replaceAll('\\', '\\\\')
    .replaceAll("'", "\\'")
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\r')
    .replaceAll('\u2028', '\\u2028')
    .replaceAll('\u2029', '\\u2029');
  return `'${escaped}'`;
}

/**
 * Convert snake_case to camelCase
 */
export function toCamelCase(name: string): string {
  return name.replaceAll(/_([a-z])/g, (_: string, letter: string) => letter.toUpperCase());
}

/**
 * Object key for a column: camelCase when that is an identifier, otherwise
 * the quoted column name
 */
export function propertyKey(columnName: string): string {
  const camel = toCamelCase(columnName);
  return isIdentifier(camel) ? camel : quote(columnName);
}

/**
 * `.key` or `['key']` to read a property written by {@link propertyKey}
 */
export function propertyAccess(key: string): string {
  return isIdentifier(key) ? `.${key}` : `[${key}]`;
}
