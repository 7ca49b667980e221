import { mulberry32, shuffle } from "../../domain/entities/RoomRules.js";
import type { WordSource } from "../../domain/ports/WordSource.js";

/**
 * Deals words in a seeded random order and reshuffles once every word has
 * been used, so nothing repeats within a pass.
 */
export class ShuffledWordSource implements WordSource {
  readonly #words: readonly string[];
  readonly #rng: () => number;
  #deck: string[] = [];

  constructor(words: readonly string[], seed: number) {
    const usable = [...new Set(words.map((word) => word.trim()))].filter(
      (word) => word.length > 0,
    );
    if (usable.length === 0) {
      throw new Error("Word list must contain at least one word");
    }
    this.#words = usable;
    this.#rng = mulberry32(seed);
  }

  get size(): number {
    return this.#words.length;
  }

  nextWord(): string {
    if (this.#deck.length === 0) {
      this.#deck = shuffle(this.#words, this.#rng);
    }
    const word = this.#deck.pop();
    if (word === undefined) {
      throw new Error("Word deck is empty");
    }
    return word;
  }
}
