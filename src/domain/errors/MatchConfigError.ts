export class MatchConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "MatchConfigError";
  }

  static because(issues: readonly string[]): MatchConfigError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid match configuration"
        : issues.length === 1
          ? `Invalid match configuration: ${firstIssue ?? "unknown issue"}`
          : `Invalid match configuration: ${issues.join("; ")}`;
    return new MatchConfigError(message, issues);
  }
}
