/** A single problem found while validating a lexicon, profile or record. */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Raised when a load (lexicon, scoring profile, record batch envelope) is rejected.
 * Carries every issue found, not just the first.
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.map(formatIssue).join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export function formatIssue(issue: ValidationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

/** Flatten zod-style issues (path arrays) into ValidationIssues. */
export function toValidationIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
  prefix = '',
): ValidationIssue[] {
  return issues.map(i => ({
    path: [prefix, ...i.path.map(String)].filter(Boolean).join('.'),
    message: i.message,
  }));
}
