/** A request carried missing or malformed fields; `issues` lists each problem. */
export class GameCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[],
  ) {
    super(message);
    this.name = "GameCommandInputError";
  }

  static because(issues: readonly string[]): GameCommandInputError {
    const [firstIssue] = issues;
    if (firstIssue === undefined) return new GameCommandInputError("Invalid request", issues);
    const message = issues.length === 1 ? firstIssue : `Invalid request: ${issues.join("; ")}`;
    return new GameCommandInputError(message, issues);
  }
}
