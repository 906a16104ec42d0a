import { Invoice, InvoiceChanges, InvoiceFilters, NewInvoice } from '../../models/financial/invoice.model';
import { InvoiceRepository } from '../types';
import { mapInvoice } from './mappers';
import { buildSetClause, SqlClient } from './sql';

const INVOICE_COLUMNS = `
  id, project_id, project_po_id, client_name, invoice_item, amount, description,
  due_date, file_path, status, payment_status, total_paid_amount,
  created_by, created_at, updated_at, is_deleted
`;

export class PgInvoiceRepository implements InvoiceRepository {
  constructor(private readonly db: SqlClient) {}

  async insert(invoice: NewInvoice): Promise<Invoice> {
    const result = await this.db.query(
      `
      INSERT INTO invoices (
        project_id, project_po_id, client_name, invoice_item, amount, description,
        due_date, file_path, status, payment_status, total_paid_amount, created_by
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 'uploaded', 'not_paid', 0, $9)
      RETURNING ${INVOICE_COLUMNS}
      `,
      [
        invoice.project_id,
        invoice.project_po_id,
        invoice.client_name,
        invoice.invoice_item,
        invoice.amount,
        invoice.description,
        invoice.due_date,
        invoice.file_path,
        invoice.created_by,
      ]
    );
    return mapInvoice(result.rows[0]);
  }

  async findActiveById(id: string): Promise<Invoice | null> {
    const result = await this.db.query(
      `SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = $1 AND is_deleted = FALSE`,
      [id]
    );
    return result.rows.length > 0 ? mapInvoice(result.rows[0]) : null;
  }

  async findActiveByIdForUpdate(id: string): Promise<Invoice | null> {
    const result = await this.db.query(
      `SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = $1 AND is_deleted = FALSE FOR UPDATE`,
      [id]
    );
    return result.rows.length > 0 ? mapInvoice(result.rows[0]) : null;
  }

  async findActive(filters: InvoiceFilters = {}): Promise<Invoice[]> {
    const conditions = ['is_deleted = FALSE'];
    const values: unknown[] = [];

    if (filters.project_id) {
      values.push(filters.project_id);
      conditions.push(`project_id = $${values.length}`);
    }
    if (filters.status) {
      values.push(filters.status);
      conditions.push(`status = $${values.length}`);
    }
    if (filters.payment_status) {
      values.push(filters.payment_status);
      conditions.push(`payment_status = $${values.length}`);
    }

    const result = await this.db.query(
      `
      SELECT ${INVOICE_COLUMNS}
      FROM invoices
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at ASC, id ASC
      `,
      values
    );
    return result.rows.map(mapInvoice);
  }

  async countActiveByPO(poId: string): Promise<number> {
    const result = await this.db.query(
      `SELECT COUNT(*) AS count FROM invoices WHERE project_po_id = $1 AND is_deleted = FALSE`,
      [poId]
    );
    return Number(result.rows[0].count);
  }

  async update(id: string, changes: InvoiceChanges): Promise<Invoice> {
    const { setParts, values, nextParam } = buildSetClause(changes);
    setParts.push('updated_at = CURRENT_TIMESTAMP');

    const result = await this.db.query(
      `
      UPDATE invoices
      SET ${setParts.join(', ')}
      WHERE id = $${nextParam}
      RETURNING ${INVOICE_COLUMNS}
      `,
      [...values, id]
    );
    if (result.rows.length === 0) {
      throw new Error(`Invoice ${id} disappeared during update`);
    }
    return mapInvoice(result.rows[0]);
  }

  async softDelete(id: string): Promise<void> {
    await this.db.query(
      `UPDATE invoices SET is_deleted = TRUE, updated_at = CURRENT_TIMESTAMP WHERE id = $1`,
      [id]
    );
  }
}
