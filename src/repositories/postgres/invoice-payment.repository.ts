import { InvoicePayment, NewInvoicePayment } from '../../models/financial/invoice.model';
import { InvoicePaymentRepository, PaymentOrder } from '../types';
import { mapInvoicePayment } from './mappers';
import { SqlClient } from './sql';

const PAYMENT_COLUMNS = `
  id, invoice_id, amount, payment_date, description, payment_method, reference_number,
  created_by, created_at, updated_at, is_deleted
`;

export class PgInvoicePaymentRepository implements InvoicePaymentRepository {
  constructor(private readonly db: SqlClient) {}

  async insert(payment: NewInvoicePayment): Promise<InvoicePayment> {
    const result = await this.db.query(
      `
      INSERT INTO invoice_payments (
        invoice_id, amount, payment_date, description, payment_method, reference_number, created_by
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${PAYMENT_COLUMNS}
      `,
      [
        payment.invoice_id,
        payment.amount,
        payment.payment_date,
        payment.description,
        payment.payment_method,
        payment.reference_number,
        payment.created_by,
      ]
    );
    return mapInvoicePayment(result.rows[0]);
  }

  async findActiveByInvoice(invoiceId: string, order: PaymentOrder): Promise<InvoicePayment[]> {
    const direction = order === 'asc' ? 'ASC' : 'DESC';
    const result = await this.db.query(
      `
      SELECT ${PAYMENT_COLUMNS}
      FROM invoice_payments
      WHERE invoice_id = $1 AND is_deleted = FALSE
      ORDER BY payment_date ${direction}, created_at ${direction}
      `,
      [invoiceId]
    );
    return result.rows.map(mapInvoicePayment);
  }

  async sumActiveByInvoice(invoiceId: string): Promise<number> {
    const result = await this.db.query(
      `
      SELECT COALESCE(SUM(amount), 0) AS total_paid
      FROM invoice_payments
      WHERE invoice_id = $1 AND is_deleted = FALSE
      `,
      [invoiceId]
    );
    return Number(result.rows[0].total_paid);
  }
}
