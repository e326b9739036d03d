/**
 * Raised when text matches neither a known alpha-2 nor a known alpha-3 code.
 * The offending text is kept verbatim on `code`.
 */
export class UnrecognizedCodeError extends Error {
  readonly code: string;

  constructor(code: string, scheme = "ISO 3166 alpha country code") {
    super(`unrecognized ${scheme}: ${code}`);
    this.name = "UnrecognizedCodeError";
    this.code = code;
  }
}

/** The record feed could not be compiled. Every issue found is listed. */
export class DatasetCompileError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Classification dataset rejected (${issues.length} issue${issues.length === 1 ? "" : "s"}): ${issues.join("; ")}`
    );
    this.name = "DatasetCompileError";
    this.issues = issues;
  }
}

/** The compiled tables disagree with themselves. Always a bug, never user input. */
export class ClassificationInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ClassificationInvariantError";
  }
}
