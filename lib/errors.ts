/**
 * Error taxonomy
 *
 * UpstreamFetchError never leaves a provider: it is logged and the call
 * degrades to an empty result. ValidationError is surfaced to the client
 * as a 422 before any upstream call is made.
 */

export class UpstreamFetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'UpstreamFetchError';
    this.url = url;
    this.status = options.status ?? null;
  }
}

export interface ValidationIssue {
  loc: string[];
  msg: string;
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map((issue) => `${issue.loc.join('.')}: ${issue.msg}`).join('; '));
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
