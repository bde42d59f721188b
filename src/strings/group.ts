/**
 * Group extracted strings under location headers ("YOU ARE IN ...")
 */

export const DEFAULT_LOCATION_PREFIXES: readonly string[] = ['YOU ARE ', 'YOU HAVE ENTERED', 'YOU ARE IN '];

export interface StringGroup {
  header: string | null; // null for text seen before the first location
  lines: string[];
}

export function lightlyClean(s: string): string {
  let out = s.replace(/""/g, '"').replace(/\s+/g, ' ').trim();
  if (out.endsWith('."') && !out.endsWith('..."')) {
    out = out.slice(0, -1);
  }
  return out;
}

export function isLocationHeader(line: string, prefixes: readonly string[] = DEFAULT_LOCATION_PREFIXES): boolean {
  const upper = line.toUpperCase();
  return prefixes.some(prefix => upper.startsWith(prefix));
}

export function groupByLocation(
  lines: readonly string[],
  prefixes: readonly string[] = DEFAULT_LOCATION_PREFIXES
): StringGroup[] {
  const groups: StringGroup[] = [];
  let current: StringGroup | null = null;

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;

    if (isLocationHeader(line, prefixes)) {
      if (current) groups.push(current);
      current = { header: line, lines: [] };
      continue;
    }

    if (current) {
      current.lines.push(line);
      continue;
    }

    const last = groups[groups.length - 1];
    if (last && last.header === null) {
      last.lines.push(line);
    } else {
      groups.push({ header: null, lines: [line] });
    }
  }

  if (current) groups.push(current);
  return groups;
}

export function formatGroups(groups: readonly StringGroup[]): string {
  let out = '';
  for (const group of groups) {
    out += (group.header ?? 'GLOBAL / SYSTEM TEXT') + '\n';
    for (const line of group.lines) {
      out += '  ' + line + '\n';
    }
    out += '\n';
  }
  return out;
}
