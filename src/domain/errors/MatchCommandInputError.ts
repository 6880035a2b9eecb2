export class MatchCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "MatchCommandInputError";
  }

  static because(issues: readonly string[]): MatchCommandInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid match command input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid match command input")
          : `Invalid match command input: ${issues.join("; ")}`;
    return new MatchCommandInputError(message, issues);
  }
}
