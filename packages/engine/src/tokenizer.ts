/** Split a raw input line into lower-cased, whitespace-separated tokens. */
export function tokenize(line: string): string[] {
  return line.trim().toLowerCase().split(/\s+/).filter(Boolean);
}
