import { NextResponse, type NextRequest } from 'next/server';
import { ValidationError, errorMessage } from './errors';

/**
 * Shared response helpers for the route handler factories.
 */

export function success<T extends object>(payload: T): NextResponse {
  return NextResponse.json({ status: 'success', ...payload });
}

export function validationErrorResponse(error: ValidationError): NextResponse {
  return NextResponse.json(
    { status: 'error', error: 'validation_error', detail: error.issues },
    { status: 422 }
  );
}

export function serverErrorResponse(tag: string, err: unknown, detail = errorMessage(err)): NextResponse {
  console.error(`[${tag}] Error:`, err);
  return NextResponse.json({ status: 'error', detail }, { status: 500 });
}

export interface IntRange {
  min: number;
  max: number;
  fallback: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Reads `?days=`; throws ValidationError before any upstream call is made. */
export function parseDaysParam(request: NextRequest, range: IntRange): number {
  const raw = request.nextUrl.searchParams.get('days');
  if (raw === null) return range.fallback;

  const loc = ['query', 'days'];
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ValidationError([{ loc, msg: 'Input should be a valid integer' }]);
  }

  const days = Number.parseInt(trimmed, 10);
  if (days < range.min) {
    throw new ValidationError([{ loc, msg: `Input should be greater than or equal to ${range.min}` }]);
  }
  if (days > range.max) {
    throw new ValidationError([{ loc, msg: `Input should be less than or equal to ${range.max}` }]);
  }
  return days;
}

/**
 * Wraps a handler so ValidationError becomes a 422 and anything else a 500.
 */
export function withErrorHandling<Args extends unknown[]>(
  tag: string,
  handler: (...args: Args) => Promise<NextResponse>
): (...args: Args) => Promise<NextResponse> {
  return async (...args) => {
    try {
      return await handler(...args);
    } catch (err) {
      if (err instanceof ValidationError) return validationErrorResponse(err);
      return serverErrorResponse(tag, err);
    }
  };
}
