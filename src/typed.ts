/**
 * Decoding into validated application types. The document is read into
 * plain data by `NativeVisitor` and checked against a zod schema.
 */

import * as z from 'zod';
import type { EdnValue } from './ast.js';
import { EdnError } from './errors.js';
import { toNative } from './native.js';
import { parseWith, type Input, type ParseOptions } from './parser.js';
import { NativeVisitor, type NativeValue } from './visitor.js';

function describe(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function validate<S extends z.ZodType>(data: NativeValue, schema: S): z.output<S> {
  const result = schema.safeParse(data);
  if (result.success) return result.data;
  throw EdnError.data(`invalid data: ${describe(result.error)}`, { cause: result.error });
}

/** Decodes `input` and validates it against `schema`. Mismatches are data errors. */
export function parseAs<S extends z.ZodType>(input: Input, schema: S, options?: ParseOptions): z.output<S> {
  return validate(parseWith(input, new NativeVisitor(), options), schema);
}

/** Validates an already decoded value against `schema`. */
export function fromValue<S extends z.ZodType>(value: EdnValue, schema: S): z.output<S> {
  return validate(toNative(value), schema);
}
