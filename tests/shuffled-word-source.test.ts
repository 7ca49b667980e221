import { describe, expect, it } from "vitest";

import { ShuffledWordSource } from "../src/adapters/in-memory/ShuffledWordSource.js";

const WORDS = ["apple", "banana", "cherry", "grape", "lemon"];

function draw(source: ShuffledWordSource, count: number): string[] {
  return Array.from({ length: count }, () => source.nextWord());
}

describe("ShuffledWordSource", () => {
  it("deals every word once before any repeats", () => {
    const source = new ShuffledWordSource(WORDS, 11);

    const firstPass = draw(source, WORDS.length);
    const secondPass = draw(source, WORDS.length);

    expect([...firstPass].sort()).toEqual(WORDS);
    expect([...secondPass].sort()).toEqual(WORDS);
  });

  it("gives equal sequences for equal seeds", () => {
    const first = draw(new ShuffledWordSource(WORDS, 5), 12);
    const second = draw(new ShuffledWordSource(WORDS, 5), 12);

    expect(first).toEqual(second);
  });

  it("trims the list and drops duplicates and blanks", () => {
    const source = new ShuffledWordSource([" apple ", "apple", "", "   ", "pear"], 1);

    expect(source.size).toBe(2);
    expect(draw(source, 2).sort()).toEqual(["apple", "pear"]);
  });

  it("rejects a list without usable words", () => {
    expect(() => new ShuffledWordSource([], 1)).toThrow(
      "Word list must contain at least one word",
    );
    expect(() => new ShuffledWordSource(["", "  "], 1)).toThrow(
      "Word list must contain at least one word",
    );
  });
});
