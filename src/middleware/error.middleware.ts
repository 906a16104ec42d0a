import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ValidationError } from '../utils/errors';
import { sendError, sendResponse } from '../utils/response';

const formatMegabytes = (bytes: number): string => String(Number((bytes / (1024 * 1024)).toFixed(2)));

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

/**
 * Translates multer and body-parser failures into the response envelope.
 * Must be registered after all routes.
 */
export const createErrorHandler =
  (maxFileSizeBytes: number) =>
  (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof multer.MulterError) {
      const message =
        error.code === 'LIMIT_FILE_SIZE'
          ? `File size exceeds ${formatMegabytes(maxFileSizeBytes)}MB limit`
          : error.code === 'LIMIT_UNEXPECTED_FILE'
            ? `Unexpected file field '${error.field ?? ''}'`
            : error.message;
      sendError(res, new ValidationError(message), 'processing upload');
      return;
    }

    if (isBodyParseError(error)) {
      sendError(res, new ValidationError('Invalid JSON in request body'), 'parsing request body');
      return;
    }

    sendError(res, error, `handling ${req.method} ${req.originalUrl}`);
  };

export const notFoundHandler = (req: Request, res: Response): void => {
  sendResponse(res, 404, `Route ${req.method} ${req.originalUrl} not found`);
};
