import { QueryResultRow } from 'pg';
import { Project, ProjectBalanceEntry, ProjectPO } from '../../models/business/project.model';
import { Invoice, InvoicePayment } from '../../models/financial/invoice.model';
import { ActivityLog } from '../../models/system/activity-log.model';

// DOUBLE PRECISION comes back as number, aggregates (SUM/COUNT) as strings; normalise both.

export const mapProject = (row: QueryResultRow): Project => ({
  id: row.id,
  name: row.name,
  description: row.description,
  location: row.location,
  start_date: row.start_date,
  end_date: row.end_date,
  po_balance: Number(row.po_balance),
  estimated_balance: Number(row.estimated_balance),
  actual_balance: Number(row.actual_balance),
  created_by: row.created_by,
  created_at: row.created_at,
  updated_at: row.updated_at,
  is_deleted: row.is_deleted,
});

export const mapBalanceEntry = (row: QueryResultRow): ProjectBalanceEntry => ({
  id: row.id,
  project_id: row.project_id,
  adjustment: Number(row.adjustment),
  balance_type: row.balance_type,
  description: row.description,
  created_at: row.created_at,
});

export const mapProjectPO = (row: QueryResultRow): ProjectPO => ({
  id: row.id,
  project_id: row.project_id,
  po_number: row.po_number,
  amount: Number(row.amount),
  description: row.description,
  file_path: row.file_path,
  created_by: row.created_by,
  created_at: row.created_at,
  updated_at: row.updated_at,
  is_deleted: row.is_deleted,
});

export const mapInvoice = (row: QueryResultRow): Invoice => ({
  id: row.id,
  project_id: row.project_id,
  project_po_id: row.project_po_id,
  client_name: row.client_name,
  invoice_item: row.invoice_item,
  amount: Number(row.amount),
  description: row.description,
  due_date: row.due_date,
  file_path: row.file_path,
  status: row.status,
  payment_status: row.payment_status,
  total_paid_amount: Number(row.total_paid_amount),
  created_by: row.created_by,
  created_at: row.created_at,
  updated_at: row.updated_at,
  is_deleted: row.is_deleted,
});

export const mapInvoicePayment = (row: QueryResultRow): InvoicePayment => ({
  id: row.id,
  invoice_id: row.invoice_id,
  amount: Number(row.amount),
  payment_date: row.payment_date,
  description: row.description,
  payment_method: row.payment_method,
  reference_number: row.reference_number,
  created_by: row.created_by,
  created_at: row.created_at,
  updated_at: row.updated_at,
  is_deleted: row.is_deleted,
});

export const mapActivityLog = (row: QueryResultRow): ActivityLog => ({
  id: row.id,
  entity: row.entity,
  action: row.action,
  entity_id: row.entity_id,
  performed_by: row.performed_by,
  timestamp: row.timestamp,
});
