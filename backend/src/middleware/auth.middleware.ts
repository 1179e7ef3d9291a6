import { NextFunction, Request, Response } from 'express';
import { Database } from '../config/database';
import { getUserByUsername } from '../services/user.service';
import { JWTPayload, PublicUser } from '../types';
import { verifyToken } from '../utils/jwt.util';
import { sendError } from '../utils/response.util';

export interface AuthRequest extends Request {
  user?: JWTPayload;
}

export const authenticate = (secret: string) => {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      sendError(res, 401, 'Missing authorization token');
      return;
    }

    const payload = verifyToken(authHeader.slice('Bearer '.length), secret);
    if (!payload) {
      sendError(res, 401, 'Invalid or expired token');
      return;
    }

    req.user = payload;
    next();
  };
};

/**
 * Loads the account behind the token. Sends 401/404 and resolves to null
 * when there is none, so callers only have to return.
 */
export const resolveCurrentUser = async (
  db: Database,
  req: AuthRequest,
  res: Response
): Promise<PublicUser | null> => {
  if (!req.user) {
    sendError(res, 401, 'Authentication required');
    return null;
  }

  const user = await getUserByUsername(db, req.user.username);
  if (!user) {
    sendError(res, 404, 'User not found');
    return null;
  }

  return user;
};
