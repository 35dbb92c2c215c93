/**
 * Body validation middleware.
 * Parses the JSON body once, checks it against a schema and hands the
 * parsed object to the handler on ctx.body.
 * Throws ValidationError with field-level errors, which the error handler
 * turns into a 400.
 */

import type { BodySchema, FieldSchema } from '../types/common.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';
import { ValidationError } from '../errors.js';

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let parsed: unknown;

      try {
        parsed = await req.json();
      } catch {
        throw new ValidationError('Request body must be valid JSON');
      }

      if (!isPlainObject(parsed)) {
        throw new ValidationError('Request body must be a JSON object');
      }

      const errors = validateFields(parsed, schema);

      if (errors.length > 0) {
        throw new ValidationError(errors.join('; '), { fields: errors });
      }

      return next(req, { ...ctx, body: parsed });
    };
  };
}

/** The body validateBody attached. Throws if the route forgot the middleware. */
export function bodyOf(ctx: HandlerContext): Record<string, unknown> {
  if (!ctx.body) {
    throw new ValidationError('Request body is required');
  }
  return ctx.body;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateFields(
  body: Record<string, unknown>,
  schema: BodySchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    if (value === undefined || value === null) {
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(
  field: string,
  value: unknown,
  schema: FieldSchema
): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'number':
      if (typeof value !== 'number') return `${field} must be a number`;
      break;
  }
  return null;
}

function checkConstraints(
  field: string,
  value: unknown,
  schema: FieldSchema
): string[] {
  const errors: string[] = [];

  if (typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  return errors;
}
