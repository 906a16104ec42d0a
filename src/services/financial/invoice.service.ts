import { randomUUID } from 'crypto';
import path from 'path';
import {
  CreateInvoiceRequest,
  Invoice,
  InvoiceChanges,
  InvoiceFilters,
  InvoiceStatus,
  UpdateInvoiceRequest,
} from '../../models/financial/invoice.model';
import { DataStore } from '../../repositories/types';
import { parseDueDate } from '../../utils/dates';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { DocumentPolicy, UploadedDocument, validateDocument } from '../business/po-binder';
import { buildFileUrl, DocumentStorage, StagedDocument } from '../storage/document-storage.service';
import { derivePaymentStatus, hasCentPrecision, roundCurrency } from './payment-status';

export const INVOICE_DOCUMENT_FOLDER = 'invoices';

const INVALID_DUE_DATE = 'Invalid due_date format. Use YYYY-MM-DD or YYYY-MM-DD HH:MM:SS';
const AMOUNT_PRECISION = 'Amount must have at most 2 decimal places';

export interface InvoiceView extends Invoice {
  file_url: string | null;
}

export interface InvoiceDetails extends InvoiceView {
  project_name: string | null;
}

export interface InvoiceServiceOptions {
  documents: DocumentPolicy;
  hostUrl: string;
}

/**
 * Service for managing invoices raised against projects and their POs.
 * Payment bookkeeping lives in PaymentService; this service only guards the
 * paid total when the invoice amount changes.
 */
export class InvoiceService {
  constructor(
    private readonly store: DataStore,
    private readonly storage: DocumentStorage,
    private readonly options: InvoiceServiceOptions
  ) {}

  private toView(invoice: Invoice): InvoiceView {
    return { ...invoice, file_url: buildFileUrl(this.options.hostUrl, invoice.file_path) };
  }

  /**
   * Creates an invoice with an optional attached document.
   * The document is written to staging first and only moved into place once the row is committed.
   */
  async create(request: CreateInvoiceRequest, file: UploadedDocument | null, userId: string): Promise<InvoiceView> {
    if (!(request.amount > 0)) {
      throw new ValidationError('Amount must be greater than 0');
    }
    if (!hasCentPrecision(request.amount)) {
      throw new ValidationError(AMOUNT_PRECISION);
    }
    const dueDate = parseDueDate(request.due_date);
    if (!dueDate) {
      throw new ValidationError(INVALID_DUE_DATE);
    }

    const staged: StagedDocument[] = [];
    if (file) {
      validateDocument(file, this.options.documents);
      const name = `Invoice_${randomUUID()}${path.extname(file.originalname).toLowerCase()}`;
      staged.push(await this.storage.stage(INVOICE_DOCUMENT_FOLDER, name, file.buffer));
    }

    const invoice = await this.storage.commitWithDocuments(staged, () =>
      this.store.transaction(async (repos) => {
        const project = await repos.projects.findActiveById(request.project_id);
        if (!project) {
          throw new NotFoundError('Project not found');
        }

        const poId = request.project_po_id ?? null;
        if (poId) {
          const po = await repos.pos.findActiveById(project.id, poId);
          if (!po) {
            throw new NotFoundError('PO not found for this project');
          }
        }

        const created = await repos.invoices.insert({
          project_id: project.id,
          project_po_id: poId,
          client_name: request.client_name,
          invoice_item: request.invoice_item,
          amount: request.amount,
          description: request.description ?? null,
          due_date: dueDate,
          file_path: staged.length > 0 ? staged[0].storedPath : null,
          created_by: userId,
        });

        await repos.logs.record({ entity: 'Invoice', action: 'Create', entity_id: created.id, performed_by: userId });
        return created;
      })
    );

    return this.toView(invoice);
  }

  async findAll(filters: InvoiceFilters = {}): Promise<InvoiceView[]> {
    const invoices = await this.store.read((repos) => repos.invoices.findActive(filters));
    return invoices.map((invoice) => this.toView(invoice));
  }

  async findById(invoiceId: string): Promise<InvoiceDetails> {
    return this.store.read(async (repos) => {
      const invoice = await repos.invoices.findActiveById(invoiceId);
      if (!invoice) {
        throw new NotFoundError('Invoice not found');
      }
      const project = await repos.projects.findActiveById(invoice.project_id);
      return { ...this.toView(invoice), project_name: project ? project.name : null };
    });
  }

  /**
   * Applies a partial update. Lowering the amount below what has already been paid is rejected;
   * the payment status is recomputed against the new amount.
   */
  async update(invoiceId: string, request: UpdateInvoiceRequest, userId: string): Promise<InvoiceView> {
    const changes: InvoiceChanges = {};
    if (request.client_name !== undefined) changes.client_name = request.client_name;
    if (request.invoice_item !== undefined) changes.invoice_item = request.invoice_item;
    if (request.description !== undefined) changes.description = request.description;
    if (request.due_date !== undefined) {
      const dueDate = parseDueDate(request.due_date);
      if (!dueDate) {
        throw new ValidationError(INVALID_DUE_DATE);
      }
      changes.due_date = dueDate;
    }
    if (request.amount !== undefined) {
      if (!(request.amount > 0)) {
        throw new ValidationError('Amount must be greater than 0');
      }
      if (!hasCentPrecision(request.amount)) {
        throw new ValidationError(AMOUNT_PRECISION);
      }
      changes.amount = request.amount;
    }

    if (Object.keys(changes).length === 0) {
      throw new ValidationError('No fields provided for update');
    }

    const updated = await this.store.transaction(async (repos) => {
      const invoice = await repos.invoices.findActiveByIdForUpdate(invoiceId);
      if (!invoice) {
        throw new NotFoundError('Invoice not found');
      }

      if (changes.amount !== undefined) {
        if (roundCurrency(changes.amount) < roundCurrency(invoice.total_paid_amount)) {
          throw new ValidationError(
            `Invoice amount cannot be less than the total paid amount (${invoice.total_paid_amount})`
          );
        }
        changes.payment_status = derivePaymentStatus(changes.amount, invoice.total_paid_amount);
      }

      const result = await repos.invoices.update(invoiceId, changes);
      await repos.logs.record({ entity: 'Invoice', action: 'Update', entity_id: invoiceId, performed_by: userId });
      return result;
    });

    return this.toView(updated);
  }

  async updateStatus(invoiceId: string, status: InvoiceStatus, userId: string): Promise<{ id: string; status: InvoiceStatus }> {
    return this.store.transaction(async (repos) => {
      const invoice = await repos.invoices.findActiveById(invoiceId);
      if (!invoice) {
        throw new NotFoundError('Invoice not found');
      }

      const updated = await repos.invoices.update(invoiceId, { status });
      await repos.logs.record({
        entity: 'Invoice',
        action: 'Status Update',
        entity_id: invoiceId,
        performed_by: userId,
      });
      return { id: updated.id, status: updated.status };
    });
  }

  async delete(invoiceId: string, userId: string): Promise<{ deleted_invoice_id: string }> {
    return this.store.transaction(async (repos) => {
      const invoice = await repos.invoices.findActiveById(invoiceId);
      if (!invoice) {
        throw new NotFoundError('Invoice not found');
      }

      await repos.invoices.softDelete(invoiceId);
      await repos.logs.record({ entity: 'Invoice', action: 'Delete', entity_id: invoiceId, performed_by: userId });
      return { deleted_invoice_id: invoiceId };
    });
  }
}
