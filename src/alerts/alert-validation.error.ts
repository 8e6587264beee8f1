import type { AlertValidationIssue } from './alert.interfaces';

export class AlertValidationError extends Error {
  public constructor(public readonly issues: readonly AlertValidationIssue[]) {
    super(
      `Invalid alert payload: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')}`,
    );
    this.name = AlertValidationError.name;
  }
}
