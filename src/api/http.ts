/**
 * Small helpers shared by the endpoint modules.
 */

import { ValidationError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

/**
 * Path segment by position, ignoring empty segments.
 * /api/v1/submissions/IDEA-ABC234/ancestors → index 3 is "IDEA-ABC234".
 */
export function pathSegment(req: Request, index: number): string {
  const parts = new URL(req.url).pathname.split('/').filter(Boolean);
  const value = parts[index];
  if (value === undefined) {
    throw new ValidationError(`Missing path segment ${index}`);
  }
  return decodeURIComponent(value);
}

export function parseDate(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} must be an ISO-8601 date`, { [field]: value });
  }
  return date;
}

export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  return typeof value === 'string' ? value : undefined;
}

export function optionalNumber(body: Record<string, unknown>, field: string): number | undefined {
  const value = body[field];
  return typeof value === 'number' ? value : undefined;
}

export function requiredString(body: Record<string, unknown>, field: string): string {
  const value = optionalString(body, field);
  if (value === undefined) {
    throw new ValidationError(`${field} is required`);
  }
  return value;
}

export function requiredNumber(body: Record<string, unknown>, field: string): number {
  const value = optionalNumber(body, field);
  if (value === undefined) {
    throw new ValidationError(`${field} is required`);
  }
  return value;
}
