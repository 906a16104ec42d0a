import { InvoicePayment, PaymentStatus, RecordPaymentRequest } from '../../models/financial/invoice.model';
import { DataStore } from '../../repositories/types';
import { parseDate } from '../../utils/dates';
import { NotFoundError, OverpaymentError, ValidationError } from '../../utils/errors';
import { derivePaymentStatus, hasCentPrecision, roundCurrency } from './payment-status';

export interface RecordedPayment extends InvoicePayment {
  invoice_payment_status: PaymentStatus;
  invoice_total_paid: number;
}

export interface InvoicePaymentHistory {
  invoice_id: string;
  invoice_amount: number;
  payment_status: PaymentStatus;
  total_paid_amount: number;
  remaining_amount: number;
  payments: InvoicePayment[];
}

/**
 * Ledger of payments received against invoices.
 * Keeps `total_paid_amount` and `payment_status` on the invoice in step with its payments.
 */
export class PaymentService {
  constructor(private readonly store: DataStore) {}

  /**
   * Records a payment and recomputes the invoice's paid total and status.
   * The invoice row stays locked for the whole transaction, so concurrent payments
   * against the same invoice are applied one after the other.
   *
   * @throws {OverpaymentError} When the payment would take the paid total above the invoice amount
   */
  async recordPayment(invoiceId: string, request: RecordPaymentRequest, userId: string): Promise<RecordedPayment> {
    if (!(request.amount > 0)) {
      throw new ValidationError('Payment amount must be greater than 0');
    }
    if (!hasCentPrecision(request.amount)) {
      throw new ValidationError('Payment amount must have at most 2 decimal places');
    }
    const paymentDate = parseDate(request.payment_date);
    if (!paymentDate) {
      throw new ValidationError('Invalid payment_date format. Use YYYY-MM-DD');
    }

    return this.store.transaction(async (repos) => {
      const invoice = await repos.invoices.findActiveByIdForUpdate(invoiceId);
      if (!invoice) {
        throw new NotFoundError('Invoice not found');
      }

      const paidSoFar = roundCurrency(await repos.payments.sumActiveByInvoice(invoiceId));
      if (roundCurrency(paidSoFar + request.amount) > roundCurrency(invoice.amount)) {
        throw new OverpaymentError(invoice.amount, paidSoFar, request.amount);
      }

      const payment = await repos.payments.insert({
        invoice_id: invoiceId,
        amount: request.amount,
        payment_date: paymentDate,
        description: request.description ?? null,
        payment_method: request.payment_method ?? null,
        reference_number: request.reference_number ?? null,
        created_by: userId,
      });

      const totalPaid = roundCurrency(await repos.payments.sumActiveByInvoice(invoiceId));
      const paymentStatus = derivePaymentStatus(invoice.amount, totalPaid);
      await repos.invoices.update(invoiceId, { total_paid_amount: totalPaid, payment_status: paymentStatus });

      await repos.logs.record({
        entity: 'InvoicePayment',
        action: 'Create',
        entity_id: payment.id,
        performed_by: userId,
      });

      return { ...payment, invoice_payment_status: paymentStatus, invoice_total_paid: totalPaid };
    });
  }

  /**
   * Payments of an invoice, most recent payment date first, with the invoice's running totals.
   */
  async listPayments(invoiceId: string): Promise<InvoicePaymentHistory> {
    return this.store.read(async (repos) => {
      const invoice = await repos.invoices.findActiveById(invoiceId);
      if (!invoice) {
        throw new NotFoundError('Invoice not found');
      }

      const payments = await repos.payments.findActiveByInvoice(invoiceId, 'desc');
      return {
        invoice_id: invoice.id,
        invoice_amount: invoice.amount,
        payment_status: invoice.payment_status,
        total_paid_amount: invoice.total_paid_amount,
        remaining_amount: roundCurrency(invoice.amount - invoice.total_paid_amount),
        payments,
      };
    });
  }
}
