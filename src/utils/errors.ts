/**
 * Application error hierarchy. Each error carries the HTTP status it maps to,
 * so controllers can translate service failures into the response envelope.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message);
  }
}

/**
 * Raised when a payment would push an invoice's paid total above its amount.
 */
export class OverpaymentError extends ValidationError {
  readonly invoiceAmount: number;
  readonly totalPaid: number;
  readonly attempted: number;

  constructor(invoiceAmount: number, totalPaid: number, attempted: number) {
    const remaining = Math.max(invoiceAmount - totalPaid, 0);
    super(
      `Payment of ${attempted} exceeds the remaining balance of ${remaining} on this invoice (amount ${invoiceAmount}, already paid ${totalPaid})`
    );
    this.invoiceAmount = invoiceAmount;
    this.totalPaid = totalPaid;
    this.attempted = attempted;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Not authorized to perform this action') {
    super(403, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message);
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
