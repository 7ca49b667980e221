import { readFileSync } from "node:fs";

/** Reads a JSON array of words. */
export function loadWordList(path: string): string[] {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!Array.isArray(parsed) || !parsed.every((word) => typeof word === "string")) {
    throw new Error(`Word list at ${path} must be a JSON array of strings`);
  }
  const words = parsed.filter((word): word is string => typeof word === "string");
  if (words.length === 0) {
    throw new Error(`Word list at ${path} is empty`);
  }
  return words;
}
