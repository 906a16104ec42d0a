import { Invoice, PaymentStatus } from '../../models/financial/invoice.model';
import { ProjectPO } from '../../models/business/project.model';
import { DataStore } from '../../repositories/types';
import { todayIn } from '../../utils/dates';
import { NotFoundError } from '../../utils/errors';

export interface InvoiceLatenessRow {
  invoice_id: string;
  project_name: string;
  po_number: string | null;
  po_amount: number | null;
  invoice_amount: number;
  invoice_due_date: string;
  payment_status: PaymentStatus;
  total_paid_amount: number;
  is_late: boolean | null;
}

export interface ProjectInvoiceAnalytics {
  project_id: string;
  project_name: string;
  project_end_date: string | null;
  invoices: InvoiceLatenessRow[];
}

/**
 * Whether an invoice settled (or is still unsettled) after the project's end date.
 *
 * Dates are `YYYY-MM-DD` strings and compare lexically. Returns null when the project has
 * no end date, or when the invoice is marked paid but has no recorded payments.
 */
export const classifyLateness = (
  paymentStatus: PaymentStatus,
  latestPaymentDate: string | null,
  projectEndDate: string | null,
  today: string
): boolean | null => {
  if (!projectEndDate) return null;

  if (paymentStatus === 'fully_paid' || paymentStatus === 'partially_paid') {
    return latestPaymentDate ? latestPaymentDate > projectEndDate : null;
  }
  if (paymentStatus === 'not_paid') {
    return today > projectEndDate;
  }
  return null;
};

/**
 * Read-only invoice analytics per project. Computed on every call.
 */
export class AnalyticsService {
  private readonly today: () => string;

  /**
   * @param timezone - IANA zone "today" is evaluated in
   * @param today - Override for the current date, mainly for tests
   */
  constructor(
    private readonly store: DataStore,
    timezone: string,
    today?: () => string
  ) {
    this.today = today ?? (() => todayIn(timezone));
  }

  async getProjectInvoiceAnalytics(projectId: string): Promise<ProjectInvoiceAnalytics> {
    return this.store.read(async (repos) => {
      const project = await repos.projects.findActiveById(projectId);
      if (!project) {
        throw new NotFoundError('Project not found');
      }

      const pos = await repos.pos.findActiveByProject(project.id);
      const poLookup = new Map<string, ProjectPO>(pos.map((po) => [po.id, po]));
      const invoices = await repos.invoices.findActive({ project_id: project.id });
      const today = this.today();

      const rows: InvoiceLatenessRow[] = [];
      for (const invoice of invoices) {
        const latestPaymentDate = await this.latestPaymentDate(invoice, (id) =>
          repos.payments.findActiveByInvoice(id, 'desc')
        );
        const po = invoice.project_po_id ? poLookup.get(invoice.project_po_id) : undefined;

        rows.push({
          invoice_id: invoice.id,
          project_name: project.name,
          po_number: po ? po.po_number : null,
          po_amount: po ? po.amount : null,
          invoice_amount: invoice.amount,
          invoice_due_date: invoice.due_date,
          payment_status: invoice.payment_status,
          total_paid_amount: invoice.total_paid_amount,
          is_late: classifyLateness(invoice.payment_status, latestPaymentDate, project.end_date, today),
        });
      }

      return {
        project_id: project.id,
        project_name: project.name,
        project_end_date: project.end_date,
        invoices: rows,
      };
    });
  }

  private async latestPaymentDate(
    invoice: Invoice,
    loadPayments: (invoiceId: string) => Promise<{ payment_date: string }[]>
  ): Promise<string | null> {
    if (invoice.payment_status === 'not_paid') return null;
    const [latest] = await loadPayments(invoice.id);
    return latest ? latest.payment_date : null;
  }
}
