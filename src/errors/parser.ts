import type { ZodError, ZodIssue } from 'zod';
import { AmmSimError, ValidationError } from '../errors';

/**
 * Utility for turning schema issues and thrown values into
 * one-line, human-readable messages.
 */
export class ErrorParser {
  /**
   * Render a parameter path the way it is written in a config file.
   *
   * @example
   * ErrorParser.formatPath(['initialState', 'rehypFraction']); // "initialState.rehypFraction"
   */
  static formatPath(path: ReadonlyArray<string | number>): string {
    if (path.length === 0) return '(root)';
    return path
      .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
      .join('');
  }

  /**
   * Format a single schema issue as "path: message".
   */
  static formatIssue(issue: ZodIssue): string {
    return `${this.formatPath(issue.path)}: ${issue.message}`;
  }

  /**
   * Format every issue of a failed parse, in schema order.
   */
  static formatIssues(error: ZodError): string[] {
    return error.issues.map((issue) => this.formatIssue(issue));
  }

  /**
   * Convert any error into a human-friendly message, prefixed with its code when typed.
   */
  static toHumanMessage(error: unknown): string {
    if (error instanceof AmmSimError) {
      const issues = error instanceof ValidationError ? error.issues : [];
      const suffix = issues.length > 0 ? `\n  - ${issues.join('\n  - ')}` : '';
      return `[${error.code}] ${error.message}${suffix}`;
    }
    if (error instanceof Error) return error.message;
    return typeof error === 'string' ? error : 'Unknown error';
  }
}
