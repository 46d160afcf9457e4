/**
 * Utility functions for working with API paths and identifier names
 */

/**
 * Decodes `~1` and `~0` in a JSON-pointer segment
 */
export function unescapePointer(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Converts a name to PascalCase for use as a type or namespace name
 *
 * Words are split on any character that cannot appear in an identifier; the
 * first letter of each word is upper-cased and the rest is kept as written.
 *
 * @example
 * formatAsClassName("team_simple") // "TeamSimple"
 * formatAsClassName("event-keys") // "EventKeys"
 * formatAsClassName("2fa") // "_2fa"
 */
export function formatAsClassName(name: string): string {
  const joined = name
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
  return /^[0-9]/.test(joined) ? `_${joined}` : joined;
}

/**
 * Converts a name to camelCase for use as a parameter name
 *
 * @example
 * formatAsParameterName("team_key") // "teamKey"
 * formatAsParameterName("X-Api-Key") // "xApiKey"
 */
export function formatAsParameterName(name: string): string {
  const className = formatAsClassName(name);
  if (className.startsWith('_')) {
    return className;
  }
  return className.charAt(0).toLowerCase() + className.slice(1);
}

/**
 * Checks whether a path segment is a `{param}` placeholder
 */
export function isPathParameter(segment: string): boolean {
  return segment.length > 2 && segment.startsWith('{') && segment.endsWith('}');
}

/**
 * Strips the braces of a `{param}` segment; other segments are returned unchanged
 */
export function stripBraces(segment: string): string {
  return isPathParameter(segment) ? segment.slice(1, -1) : segment;
}

/**
 * Splits an API path into its non-empty segments
 *
 * @example
 * splitPath("/teams/{id}/") // ["teams", "{id}"]
 * splitPath("/") // []
 */
export function splitPath(path: string): string[] {
  return path.split('/').filter(Boolean);
}
