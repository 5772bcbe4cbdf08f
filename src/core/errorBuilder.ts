import type { ZodError } from 'zod';
import type { IssueCode, PayloadIssue } from './types.js';

type Common = {
  hint?: string;
};

export function issueAt(path: Array<string | number>, code: IssueCode, message: string, extra: Common = {}): PayloadIssue {
  return { path: path.join('.'), message, code, ...extra };
}

export function fromZodError(error: ZodError): PayloadIssue[] {
  return error.issues.map(i => issueAt(i.path, 'PAYLOAD-SHAPE-INVALID', i.message));
}

/**
 * Raised when a payload cannot be turned into the document model.
 * Carries every issue found, not just the first one.
 */
export class PayloadError extends Error {
  readonly issues: PayloadIssue[];

  constructor(what: string, issues: PayloadIssue[]) {
    const first = issues[0];
    const detail = first ? `: ${first.path ? `${first.path}: ` : ''}${first.message}` : '';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(`Invalid ${what}${detail}${more}`);
    this.name = 'PayloadError';
    this.issues = issues;
  }
}
