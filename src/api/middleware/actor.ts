import { z } from 'zod';
import type { ApiRequest, ApiResponse, Middleware } from '../../types/api';
import { ValidationError } from '../../utils/errors';

export const ACTOR_HEADER = 'x-actor-id';

const actorIdSchema = z.coerce.number().int().positive();

/**
 * Attach the acting user from the X-Actor-Id header. The header is optional;
 * a present but malformed value is rejected.
 */
export function actorContext(): Middleware {
  return async (req: ApiRequest, _res: ApiResponse, next: () => Promise<void>) => {
    const header = req.headers[ACTOR_HEADER];
    const raw = Array.isArray(header) ? header[0] : header;

    if (raw !== undefined && raw !== '') {
      const result = actorIdSchema.safeParse(raw);
      if (!result.success) {
        throw new ValidationError('Invalid X-Actor-Id header', result.error.errors);
      }
      req.actorId = result.data;
    }

    await next();
  };
}
