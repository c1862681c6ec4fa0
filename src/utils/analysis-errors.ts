/**
 * Errors raised before an analysis run starts.
 * Structural problems found while analyzing are reported as anomalies instead.
 */

export class AnalysisInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'AnalysisInputError';
    this.issues = issues;
    if (issues.length > 0) {
      this.message += `\n  ${issues.join('\n  ')}`;
    }
  }
}
