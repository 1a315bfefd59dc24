/**
 * `-H "Name: value"` option handling
 */

/**
 * Commander collector for repeatable -H options
 */
export function collectHeader(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Turn `Name: value` strings into a header record; repeated names are joined
 * with ", ".
 */
export function parseHeaderOptions(values: readonly string[] = []): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const entry of values) {
    const colonIndex = entry.indexOf(':');
    const name = colonIndex === -1 ? '' : entry.slice(0, colonIndex).trim();
    if (!name) {
      throw new Error(`Invalid header "${entry}". Expected "Name: value"`);
    }

    const value = entry.slice(colonIndex + 1).trim();
    const existing = headers[name];
    headers[name] = existing === undefined ? value : `${existing}, ${value}`;
  }

  return headers;
}

/**
 * Split a --require list; commas and whitespace both separate names
 */
export function parseNameList(value: string | undefined): string[] {
  return (value ?? '').split(/[\s,]+/).filter(Boolean);
}
