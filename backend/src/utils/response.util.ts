import { Response } from 'express';
import { ServiceError, ServiceErrorKind } from '../types';

const STATUS_BY_KIND: Record<ServiceErrorKind, number> = {
  ValidationFailed: 400,
  StateViolation: 400,
  Unauthorized: 401,
  NotFound: 404,
  Conflict: 409
};

export const sendSuccess = (
  res: Response,
  statusCode: number,
  message: string,
  data: object = {}
): void => {
  res.status(statusCode).json({ status: 'success', message, data });
};

export const sendError = (res: Response, statusCode: number, message: string): void => {
  res.status(statusCode).json({ status: 'error', message, data: {} });
};

export const sendServiceError = (res: Response, error: ServiceError): void => {
  sendError(res, STATUS_BY_KIND[error.kind], error.message);
};

export const errorText = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
