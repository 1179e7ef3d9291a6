import Joi from 'joi';
import { LEVELS, SUBJECTS } from '../config/catalog';
import { InteractionType, ServiceResult, UserPreferences } from '../types';
import { fail, ok } from './result.util';

export interface RegisterRequest {
  username: string;
  email: string;
  password: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface OnboardingRequest {
  preferences: UserPreferences;
}

export interface InteractionRequest {
  course_id: number;
  interaction_type: InteractionType;
}

export interface CountQuery {
  n: number;
}

export const registerSchema = Joi.object<RegisterRequest>({
  username: Joi.string().trim().max(50).required(),
  email: Joi.string().trim().lowercase().email().max(120).required(),
  password: Joi.string().min(8).max(128).required()
});

export const loginSchema = Joi.object<LoginRequest>({
  username: Joi.string().trim().required(),
  password: Joi.string().required()
});

export const onboardingSchema = Joi.object<OnboardingRequest>({
  preferences: Joi.object({
    subject: Joi.array().items(Joi.string().valid(...SUBJECTS)).min(1).required(),
    level: Joi.array().items(Joi.string().valid(...LEVELS)).min(1).required()
  }).required()
});

export const interactionSchema = Joi.object<InteractionRequest>({
  course_id: Joi.number().integer().positive().required(),
  interaction_type: Joi.string()
    .valid(...Object.values(InteractionType))
    .required()
});

export const countQuerySchema = (defaultCount: number, maxCount: number) =>
  Joi.object<CountQuery>({
    n: Joi.number().integer().min(1).max(maxCount).default(defaultCount)
  });

export const hasPayload = (body: unknown): body is Record<string, unknown> =>
  typeof body === 'object' &&
  body !== null &&
  !Array.isArray(body) &&
  Object.keys(body).length > 0;

/**
 * Checks a JSON body against a schema. An absent or empty body is reported
 * separately from a body that does not match.
 */
export const validatePayload = <T>(schema: Joi.ObjectSchema<T>, body: unknown): ServiceResult<T> => {
  if (!hasPayload(body)) {
    return fail('ValidationFailed', 'No data provided');
  }

  const { error, value } = schema.validate(body);
  if (error) {
    return fail('ValidationFailed', `Invalid payload: ${error.message}`);
  }
  if (value === undefined) {
    return fail('ValidationFailed', 'No data provided');
  }

  return ok(value);
};

export const validateQuery = <T>(schema: Joi.ObjectSchema<T>, query: unknown): ServiceResult<T> => {
  // Extra keys such as cache-busters are dropped
  const { error, value } = schema.validate(query ?? {}, { stripUnknown: true });
  if (error) {
    return fail('ValidationFailed', `Invalid query: ${error.message}`);
  }
  if (value === undefined) {
    return fail('ValidationFailed', 'Invalid query');
  }

  return ok(value);
};

const MAX_SERIAL_ID = 2_147_483_647;

export const isSerialId = (value: number): boolean =>
  Number.isInteger(value) && value > 0 && value <= MAX_SERIAL_ID;

export const parseId = (value: string): number | null => {
  if (!/^\d+$/.test(value)) {
    return null;
  }

  const id = parseInt(value, 10);
  return isSerialId(id) ? id : null;
};
