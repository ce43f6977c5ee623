import type { Context } from 'hono';
import type { ZodError } from 'zod';

export type ErrorStatus = 400 | 401 | 404 | 500 | 503;

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    // Malformed JSON is reported by schema validation as a missing body
    return null;
  }
}

export function jsonError(c: Context, status: ErrorStatus, error: string, details?: unknown) {
  return c.json({ success: false, error, ...(details === undefined ? {} : { details }) }, status);
}

export function formatZodError(error: ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse a positive integer query parameter, falling back when absent or invalid.
 */
export function parseLimit(raw: string | undefined, fallback: number, max = 500): number {
  if (raw === undefined) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 1) return fallback;
  return Math.min(value, max);
}
