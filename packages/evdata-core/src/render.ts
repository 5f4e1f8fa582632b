import type { EventData } from "./scanner.js";

function sortedEntries(data: EventData): Array<[string, string]> {
  return Array.from(data.entries()).sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Pretty JSON with keys in sorted order. Built line by line because object property
 * order puts integer-like keys first.
 */
export function renderEventData(data: EventData, indent = 2): string {
  const entries = sortedEntries(data);
  if (entries.length === 0) {
    return "{}";
  }

  const pad = " ".repeat(indent);
  const members = entries.map(
    ([key, value]) => `${pad}${JSON.stringify(key)}: ${JSON.stringify(value)}`
  );
  return `{\n${members.join(",\n")}\n}`;
}

function quoteValue(value: string): string {
  if (value.includes("\\")) {
    throw new Error(`Value cannot contain a backslash: ${JSON.stringify(value)}`);
  }
  return `"${value.replaceAll('"', '\\"')}"`;
}

/**
 * Writes event data back in `key:"value"` form, one pair per line, sorted by key.
 */
export function formatEventData(data: EventData): string {
  const lines: string[] = [];
  for (const [key, value] of sortedEntries(data)) {
    if (key.includes(":")) {
      throw new Error(`Key cannot contain ':': ${JSON.stringify(key)}`);
    }
    lines.push(`${key}:${quoteValue(value)}`);
  }

  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}
