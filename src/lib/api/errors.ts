import { NextResponse } from 'next/server';
import { ZodError } from 'zod';
import { ConfigurationError, UnknownTierError } from '@/lib/config/errors';
import { formatSchemaIssues } from '@/lib/config/schema';

/**
 * Map an error caught in a route handler to its JSON response
 */
export function toErrorResponse(error: unknown, fallbackMessage: string): NextResponse {
  if (error instanceof ConfigurationError) {
    return NextResponse.json(
      { error: error.message, kind: error.kind, violations: error.violations },
      { status: 500 }
    );
  }

  if (error instanceof UnknownTierError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }

  if (error instanceof ZodError) {
    return NextResponse.json(
      { error: 'Invalid request body', issues: formatSchemaIssues(error) },
      { status: 400 }
    );
  }

  // request.json() on a malformed body
  if (error instanceof SyntaxError) {
    return NextResponse.json({ error: 'Request body must be valid JSON' }, { status: 400 });
  }

  return NextResponse.json(
    { error: error instanceof Error ? error.message : fallbackMessage },
    { status: 500 }
  );
}
