// Invoice-related models

/**
 * Document lifecycle of an invoice: uploaded by site staff, then marked received by accounts.
 */
export type InvoiceStatus = 'uploaded' | 'received';

export const INVOICE_STATUSES: readonly InvoiceStatus[] = ['uploaded', 'received'];

/**
 * Derived from the invoice amount and the sum of its active payments.
 */
export type PaymentStatus = 'not_paid' | 'partially_paid' | 'fully_paid';

export const PAYMENT_STATUSES: readonly PaymentStatus[] = ['not_paid', 'partially_paid', 'fully_paid'];

/**
 * Invoice entity from the `invoices` table.
 *
 * @property {string | null} project_po_id - PO the invoice is raised against, if any
 * @property {number} total_paid_amount - Sum of non-deleted payments; never decreases
 * @property {string} due_date - Calendar date in YYYY-MM-DD format
 */
export interface Invoice {
  id: string;
  project_id: string;
  project_po_id: string | null;
  client_name: string;
  invoice_item: string;
  amount: number;
  description: string | null;
  due_date: string;
  file_path: string | null;
  status: InvoiceStatus;
  payment_status: PaymentStatus;
  total_paid_amount: number;
  created_by: string;
  created_at: Date;
  updated_at: Date;
  is_deleted: boolean;
}

export type NewInvoice = Pick<
  Invoice,
  'project_id' | 'project_po_id' | 'client_name' | 'invoice_item' | 'amount' | 'description' | 'due_date' | 'file_path' | 'created_by'
>;

export type InvoiceChanges = Partial<
  Pick<
    Invoice,
    'client_name' | 'invoice_item' | 'amount' | 'description' | 'due_date' | 'status' | 'payment_status' | 'total_paid_amount'
  >
>;

export interface InvoiceFilters {
  project_id?: string;
  status?: InvoiceStatus;
  payment_status?: PaymentStatus;
}

export interface CreateInvoiceRequest {
  project_id: string;
  project_po_id?: string | null;
  client_name: string;
  invoice_item: string;
  amount: number;
  description?: string | null;
  due_date: string;
}

export interface UpdateInvoiceRequest {
  client_name?: string;
  invoice_item?: string;
  amount?: number;
  description?: string | null;
  due_date?: string;
}

/**
 * Payment recorded against an invoice (`invoice_payments` table).
 */
export interface InvoicePayment {
  id: string;
  invoice_id: string;
  amount: number;
  payment_date: string;
  description: string | null;
  payment_method: string | null;
  reference_number: string | null;
  created_by: string;
  created_at: Date;
  updated_at: Date;
  is_deleted: boolean;
}

export type NewInvoicePayment = Pick<
  InvoicePayment,
  'invoice_id' | 'amount' | 'payment_date' | 'description' | 'payment_method' | 'reference_number' | 'created_by'
>;

export interface RecordPaymentRequest {
  amount: number;
  payment_date: string;
  description?: string | null;
  payment_method?: string | null;
  reference_number?: string | null;
}
