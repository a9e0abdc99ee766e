import type { z } from 'zod';
import type { ApiRequest, ApiResponse, Middleware } from '../../types/api';
import { ValidationError } from '../../utils/errors';

type RequestPart = 'body' | 'query' | 'params';

const FAILURE_MESSAGES: Record<RequestPart, string> = {
  body: 'Invalid request body',
  query: 'Invalid query parameters',
  params: 'Invalid path parameters'
};

/**
 * Parse one part of the request with `schema` and replace it with the parsed
 * value. Zod issues become the ValidationError details.
 */
function validatePart<T extends z.ZodTypeAny>(part: RequestPart, schema: T): Middleware {
  return async (req: ApiRequest, _res: ApiResponse, next: () => Promise<void>) => {
    const result = schema.safeParse(req[part]);
    if (!result.success) {
      throw new ValidationError(FAILURE_MESSAGES[part], result.error.errors);
    }
    req[part] = result.data;
    await next();
  };
}

export const validateBody = <T extends z.ZodTypeAny>(schema: T): Middleware => validatePart('body', schema);

export const validateQuery = <T extends z.ZodTypeAny>(schema: T): Middleware => validatePart('query', schema);

export const validateParams = <T extends z.ZodTypeAny>(schema: T): Middleware => validatePart('params', schema);
