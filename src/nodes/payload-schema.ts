/**
 * Declarative payload schemas for orchestrator wires
 *
 * ```ts
 * {
 *   entityId: { type: 'string', required: true },
 *   count: { type: 'number', range: { min: 1, max: 100 }, default: 1 },
 *   rarity: { type: 'string', enum: ['Common', 'Rare'] }
 * }
 * ```
 */

import { z } from 'zod';
import { Errors } from '../errors';
import type { Payload } from './types';

export const FIELD_TYPES = ['string', 'number', 'boolean', 'object', 'array', 'any'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** true passes; false or a message fails */
export type FieldValidator = (value: unknown, field: string, payload: Payload) => boolean | string;

const fieldSchema = z.object({
  type: z.enum(FIELD_TYPES),
  required: z.boolean().optional(),
  enum: z.array(z.string()).optional(),
  range: z.object({ min: z.number().optional(), max: z.number().optional() }).strict().optional(),
  default: z.unknown().optional(),
  validator: z.custom<FieldValidator>(value => typeof value === 'function', {
    message: 'validator must be a function'
  }).optional()
}).strict().superRefine((field, ctx) => {
  if (field.enum && field.type !== 'string') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['enum'], message: "enum needs type 'string'" });
  }
  if (field.range && field.type !== 'number') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['range'], message: "range needs type 'number'" });
  }
});

const payloadSchema = z.record(fieldSchema);

export type FieldSchema = z.infer<typeof fieldSchema>;
export type PayloadSchema = z.infer<typeof payloadSchema>;

export interface SchemaIssue {
  field: string;
  message: string;
}

export type SchemaCheck =
  | { valid: true; payload: Payload }
  | { valid: false; issues: SchemaIssue[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a schema definition
 * @throws BusError INVALID_DEFINITION naming the first bad fields
 */
export function parsePayloadSchema(name: string, value: unknown): PayloadSchema {
  const result = payloadSchema.safeParse(value);
  if (!result.success) {
    const reasons = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw Errors.invalidDefinition(`Schema '${name}': ${reasons.join('; ')}`);
  }
  return result.data;
}

function fieldType(name: string, field: FieldSchema): z.ZodTypeAny {
  switch (field.type) {
    case 'string': {
      const allowed = field.enum;
      if (!allowed) return z.string();
      return z.string().refine(value => allowed.includes(value), {
        message: `Field '${name}' must be one of: ${allowed.join(', ')}`
      });
    }
    case 'number': {
      let type = z.number();
      if (field.range?.min !== undefined) {
        type = type.min(field.range.min, { message: `Field '${name}' is below minimum ${field.range.min}` });
      }
      if (field.range?.max !== undefined) {
        type = type.max(field.range.max, { message: `Field '${name}' is above maximum ${field.range.max}` });
      }
      return type;
    }
    case 'boolean':
      return z.boolean();
    case 'object':
      return z.record(z.unknown());
    case 'array':
      return z.array(z.unknown());
    case 'any':
      return field.required
        ? z.unknown().refine(value => value !== undefined, { message: `Field '${name}' is required` })
        : z.unknown();
  }
}

function fieldParser(name: string, field: FieldSchema): z.ZodTypeAny {
  const type = fieldType(name, field);
  if (field.default !== undefined) return type.default(field.default);
  return field.required ? type : type.optional();
}

function issueMessage(issue: z.ZodIssue): string {
  const field = String(issue.path[0] ?? '');
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === 'undefined'
      ? `Field '${field}' is required`
      : `Field '${field}' expected type '${issue.expected}', got '${issue.received}'`;
  }
  return issue.message;
}

/**
 * Compiled form of a payload schema
 */
export class PayloadValidator {
  private readonly lenient: z.ZodTypeAny;
  private readonly strict: z.ZodTypeAny;

  constructor(readonly schema: PayloadSchema) {
    const shape: Record<string, z.ZodTypeAny> = {};
    for (const [name, field] of Object.entries(schema)) {
      shape[name] = fieldParser(name, field);
    }
    const custom = (data: Record<string, unknown>, ctx: z.RefinementCtx) => {
      for (const [name, field] of Object.entries(schema)) {
        if (!field.validator || data[name] === undefined) continue;
        const verdict = field.validator(data[name], name, data);
        if (verdict === true) continue;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: typeof verdict === 'string' ? verdict : `Field '${name}' failed custom validation`
        });
      }
    };
    this.lenient = z.object(shape).passthrough().superRefine(custom);
    this.strict = z.object(shape).strip().superRefine(custom);
  }

  /**
   * Validate and fill in defaults. With `sanitize`, fields the schema
   * does not declare are dropped.
   */
  check(payload: Payload, sanitize = false): SchemaCheck {
    const result = (sanitize ? this.strict : this.lenient).safeParse(payload);
    if (!result.success) {
      return {
        valid: false,
        issues: result.error.issues.map(issue => ({
          field: issue.path.join('.'),
          message: issueMessage(issue)
        }))
      };
    }
    const parsed: unknown = result.data;
    return { valid: true, payload: isRecord(parsed) ? parsed : {} };
  }
}
