import type { Request } from 'express';
import type { z, ZodTypeAny } from 'zod';
import { Errors } from './errorHandler.js';

/**
 * Request validation
 * Parses one part of the request with a zod schema and returns the typed result.
 * Failures become a ValidationError naming the first offending field.
 */

type RequestPart = 'body' | 'query' | 'params';

function parse<S extends ZodTypeAny>(part: RequestPart, req: Request, schema: S): z.infer<S> {
  const result = schema.safeParse(req[part]);
  if (!result.success) {
    const first = result.error.errors[0];
    const message = first ? `${first.path.join('.') || part}: ${first.message}` : 'Invalid request';
    throw Errors.validation(message, result.error.flatten());
  }
  return result.data;
}

export function parseBody<S extends ZodTypeAny>(req: Request, schema: S): z.infer<S> {
  return parse('body', req, schema);
}

export function parseQuery<S extends ZodTypeAny>(req: Request, schema: S): z.infer<S> {
  return parse('query', req, schema);
}

export function parseParams<S extends ZodTypeAny>(req: Request, schema: S): z.infer<S> {
  return parse('params', req, schema);
}
