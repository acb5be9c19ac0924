import type { ZodError } from 'zod';

/**
 * Raised at the input boundary when a graph is structurally invalid,
 * e.g. a list where a mapping of nodes was required.
 */
export class GraphInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'GraphInputError';
    this.issues = issues;
  }

  static fromZod(source: string, err: ZodError): GraphInputError {
    const issues = err.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    return new GraphInputError(`Invalid ${source}`, issues);
  }
}
