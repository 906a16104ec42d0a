import { PaymentStatus } from '../../models/financial/invoice.model';

/**
 * Rounds a monetary value to cents.
 */
export const roundCurrency = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

/**
 * True when `value` is a whole number of cents.
 */
export const hasCentPrecision = (value: number): boolean =>
  Number.isFinite(value) && Math.abs(value * 100 - Math.round(value * 100)) < 1e-6;

/**
 * Payment status for an invoice of `invoiceAmount` with `totalPaid` received so far.
 */
export const derivePaymentStatus = (invoiceAmount: number, totalPaid: number): PaymentStatus => {
  if (totalPaid <= 0) return 'not_paid';
  if (roundCurrency(totalPaid) >= roundCurrency(invoiceAmount)) return 'fully_paid';
  return 'partially_paid';
};
