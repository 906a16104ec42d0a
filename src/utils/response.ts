import { Response } from 'express';
import { errorMessage, isAppError } from './errors';

/**
 * Envelope returned by every endpoint.
 */
export interface ApiResponse<T> {
  data: T | null;
  message: string;
  status_code: number;
}

export const sendResponse = <T>(res: Response, statusCode: number, message: string, data: T | null = null): void => {
  const body: ApiResponse<T> = { data, message, status_code: statusCode };
  res.status(statusCode).json(body);
};

/**
 * Translates a caught error into the envelope.
 * Application errors keep their status and message; anything else becomes a 500
 * prefixed with `context`.
 */
export const sendError = (res: Response, error: unknown, context: string): void => {
  if (isAppError(error)) {
    sendResponse(res, error.statusCode, error.message);
    return;
  }
  console.error(`Error ${context}:`, error);
  sendResponse(res, 500, `An error occurred while ${context}: ${errorMessage(error)}`);
};
