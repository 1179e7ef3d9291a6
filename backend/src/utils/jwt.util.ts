import jwt from 'jsonwebtoken';
import { JWTPayload } from '../types';

export interface TokenSettings {
  secret: string;
  expiresInSeconds: number;
}

export const generateToken = (payload: JWTPayload, settings: TokenSettings): string => {
  return jwt.sign({ username: payload.username }, settings.secret, {
    expiresIn: settings.expiresInSeconds
  });
};

/**
 * Returns the identity carried by a token, or null when the token is
 * malformed, expired, or signed with another secret.
 */
export const verifyToken = (token: string, secret: string): JWTPayload | null => {
  try {
    const decoded = jwt.verify(token, secret);

    if (typeof decoded === 'string' || typeof decoded.username !== 'string') {
      return null;
    }

    return { username: decoded.username };
  } catch {
    return null;
  }
};
