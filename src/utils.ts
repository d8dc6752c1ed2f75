import fs from 'fs';
import path from 'path';

/** Parsed JSON from `filePath`, or `undefined` when it does not exist. Invalid JSON throws. */
export function loadJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

export function saveJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

/** Counts code points, so multi-byte characters are never split. */
export function truncateWithEllipsis(value: string, maxChars: number): string {
  const chars = [...value];
  if (chars.length <= maxChars) return value;
  return `${chars.slice(0, maxChars).join('').trimEnd()}...`;
}

export function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(' ');
}
