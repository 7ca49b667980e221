/** Supplies the secret word for each new round. */
export interface WordSource {
  nextWord(): string;
}
