import { readFileSync } from "node:fs";

/** Reads a file from `tests/fixtures/pages`. */
export function loadPage(name: string): string {
  return readFileSync(new URL(`../fixtures/pages/${name}`, import.meta.url), "utf8");
}
