import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { TokenManager } from '../services/oauth/token-manager.service';
import type { RequestContext } from '../utils/request-context';

export const USER_ID_HEADER = 'x-user-id';

/**
 * Resolves the caller from X-User-ID, fetches their Microsoft token and runs the rest of the
 * chain inside a request context holding it. Returns 401 if the header is missing.
 */
export function userContextMiddleware(tokenManager: TokenManager, context: RequestContext): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const userId = req.get(USER_ID_HEADER)?.trim();

    if (!userId) {
      res.status(401).json({ error: 'Authentication required. No X-User-ID header found.', code: 'auth_missing' });
      return;
    }

    try {
      const token = await tokenManager.getToken(userId);
      res.locals.userId = userId;
      context.run({ userId, accessToken: token.accessToken }, () => next());
    } catch (error) {
      next(error);
    }
  };
}
