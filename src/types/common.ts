/**
 * Shared schema types for request validation.
 */

export type FieldType = 'string' | 'number';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  enum?: readonly string[];
  min?: number;
  max?: number;
}

export type BodySchema = Record<string, FieldSchema>;

/** Source of "now". Injected so tests can pin time. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
