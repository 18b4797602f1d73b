import { fileURLToPath } from "node:url";

/** Absolute path of a world definition shipped in this package's data/ directory. */
export function dataFile(name: string): string {
  return fileURLToPath(new URL(`../data/${name}`, import.meta.url));
}
