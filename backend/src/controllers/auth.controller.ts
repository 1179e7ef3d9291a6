import { Request, Response } from 'express';
import { AuthRequest, resolveCurrentUser } from '../middleware/auth.middleware';
import { getUserInteractions } from '../services/interaction.service';
import { getUserPreferences } from '../services/onboarding.service';
import {
  createUser,
  getPasswordHashByUsername,
  getUserByUsername
} from '../services/user.service';
import { AppContext } from '../types/context';
import { verifyPassword } from '../utils/crypto.util';
import { generateToken } from '../utils/jwt.util';
import { errorText, sendError, sendServiceError, sendSuccess } from '../utils/response.util';
import { loginSchema, registerSchema, validatePayload } from '../utils/validators.util';
import { toInteractionView } from './interaction.controller';

export const createAuthController = ({ config, db }: AppContext) => {
  const register = async (req: Request, res: Response): Promise<void> => {
    // Validation
    const payload = validatePayload(registerSchema, req.body);
    if (!payload.ok) {
      sendServiceError(res, payload.error);
      return;
    }

    try {
      // Uniqueness checks and hashing happen in the service
      const result = await createUser(db, payload.value, config.bcryptSaltRounds);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      sendSuccess(res, 201, 'User registered successfully', result.value);
    } catch (error) {
      console.error('Registration error:', error);
      sendError(res, 500, `Error creating user: ${errorText(error)}`);
    }
  };

  const login = async (req: Request, res: Response): Promise<void> => {
    // Validation
    const payload = validatePayload(loginSchema, req.body);
    if (!payload.ok) {
      sendServiceError(res, payload.error);
      return;
    }

    const { username, password } = payload.value;

    try {
      // Check if user exists
      const passwordHash = await getPasswordHashByUsername(db, username);
      if (!passwordHash) {
        sendError(res, 404, 'User not found');
        return;
      }

      // Verify password
      const isValidPassword = await verifyPassword(password, passwordHash);
      if (!isValidPassword) {
        sendError(res, 401, 'Invalid password');
        return;
      }

      const user = await getUserByUsername(db, username);
      if (!user) {
        sendError(res, 404, 'User not found');
        return;
      }

      // Generate token
      const accessToken = generateToken({ username: user.username }, config.jwt);

      sendSuccess(res, 200, 'Login successful', {
        access_token: accessToken,
        user: {
          id: user.id,
          username: user.username,
          email: user.email
        }
      });
    } catch (error) {
      console.error('Login error:', error);
      sendError(res, 500, `Error logging in: ${errorText(error)}`);
    }
  };

  const getProfile = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const user = await resolveCurrentUser(db, req, res);
      if (!user) {
        return;
      }

      const [preferences, interactions] = await Promise.all([
        getUserPreferences(db, user.id),
        getUserInteractions(db, user.id)
      ]);

      sendSuccess(res, 200, 'User retrieved successfully', {
        user,
        preferences,
        interactions: interactions.map(toInteractionView)
      });
    } catch (error) {
      console.error('Get profile error:', error);
      sendError(res, 500, `Error retrieving user: ${errorText(error)}`);
    }
  };

  return { register, login, getProfile };
};
