import { ProjectService } from '../../src/services/business/project.service';
import { InvoiceService } from '../../src/services/financial/invoice.service';
import { PaymentService } from '../../src/services/financial/payment.service';
import { DocumentStorage } from '../../src/services/storage/document-storage.service';
import { CreateInvoiceRequest } from '../../src/models/financial/invoice.model';
import { TEST_USER_ID } from '../setup';
import {
  createUploadRoot,
  listFiles,
  makeDocument,
  projectRequest,
  removeUploadRoot,
  TEST_HOST_URL,
  testPolicy,
} from '../helpers/fixtures';
import { InMemoryDataStore } from '../helpers/in-memory-store';

describe('InvoiceService', () => {
  let root: string;
  let store: InMemoryDataStore;
  let invoiceService: InvoiceService;
  let paymentService: PaymentService;
  let projectId: string;
  let poId: string;

  const invoiceRequest = (overrides: Partial<CreateInvoiceRequest> = {}): CreateInvoiceRequest => ({
    project_id: projectId,
    project_po_id: poId,
    client_name: 'Acme Builders',
    invoice_item: 'Foundation works',
    amount: 1000,
    description: 'Phase 1',
    due_date: '2025-05-15',
    ...overrides,
  });

  beforeEach(async () => {
    root = await createUploadRoot();
    store = new InMemoryDataStore();
    const storage = new DocumentStorage(root);
    const options = { documents: testPolicy, hostUrl: TEST_HOST_URL };
    invoiceService = new InvoiceService(store, storage, options);
    paymentService = new PaymentService(store);

    const created = await new ProjectService(store, storage, options).create(
      projectRequest({ name: 'Alpha', pos: [{ po_number: 'PO001', amount: 5000 }] }),
      new Map(),
      TEST_USER_ID
    );
    projectId = created.project.id;
    poId = created.pos[0].id;
  });

  afterEach(async () => {
    await removeUploadRoot(root);
  });

  describe('create', () => {
    it('should create an uploaded, unpaid invoice', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);

      expect(invoice.status).toBe('uploaded');
      expect(invoice.payment_status).toBe('not_paid');
      expect(invoice.total_paid_amount).toBe(0);
      expect(invoice.project_po_id).toBe(poId);
      expect(invoice.file_url).toBeNull();
      expect(store.tables.logs.at(-1)).toMatchObject({ entity: 'Invoice', action: 'Create', entity_id: invoice.id });
    });

    it('should keep only the date of a due date with a time', async () => {
      const invoice = await invoiceService.create(invoiceRequest({ due_date: '2025-05-15 17:30:00' }), null, TEST_USER_ID);
      expect(invoice.due_date).toBe('2025-05-15');
    });

    it('should reject amounts finer than a cent', async () => {
      await expect(invoiceService.create(invoiceRequest({ amount: 100.005 }), null, TEST_USER_ID)).rejects.toThrow(
        'Amount must have at most 2 decimal places'
      );
    });

    it('should reject a malformed due date', async () => {
      await expect(invoiceService.create(invoiceRequest({ due_date: '15/05/2025' }), null, TEST_USER_ID)).rejects.toThrow(
        'Invalid due_date format. Use YYYY-MM-DD or YYYY-MM-DD HH:MM:SS'
      );
    });

    it('should store an attached file', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), makeDocument('bill.pdf'), TEST_USER_ID);

      expect(invoice.file_path?.startsWith('uploads/invoices/Invoice_')).toBe(true);
      expect(invoice.file_url).toBe(`${TEST_HOST_URL}/${invoice.file_path}`);
      const files = await listFiles(root);
      expect(files).toEqual([invoice.file_path?.replace('uploads/', '')]);
    });

    it('should reject an unknown project and discard the staged file', async () => {
      await expect(
        invoiceService.create(
          invoiceRequest({ project_id: '6f1c2c1e-8d7a-4a7e-9a55-1c2b3d4e5f60', project_po_id: null }),
          makeDocument('bill.pdf'),
          TEST_USER_ID
        )
      ).rejects.toThrow('Project not found');
      expect(await listFiles(root)).toEqual([]);
    });

    it('should reject a PO that belongs to another project', async () => {
      await expect(
        invoiceService.create(invoiceRequest({ project_po_id: '6f1c2c1e-8d7a-4a7e-9a55-1c2b3d4e5f60' }), null, TEST_USER_ID)
      ).rejects.toThrow('PO not found for this project');
    });
  });

  describe('queries', () => {
    it('should filter by project, status and payment status', async () => {
      const first = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);
      const second = await invoiceService.create(invoiceRequest({ invoice_item: 'Roofing' }), null, TEST_USER_ID);
      await invoiceService.updateStatus(second.id, 'received', TEST_USER_ID);
      await paymentService.recordPayment(first.id, { amount: 100, payment_date: '2025-05-01' }, TEST_USER_ID);

      expect((await invoiceService.findAll({ project_id: projectId })).map((i) => i.id)).toEqual([first.id, second.id]);
      expect((await invoiceService.findAll({ status: 'received' })).map((i) => i.id)).toEqual([second.id]);
      expect((await invoiceService.findAll({ payment_status: 'partially_paid' })).map((i) => i.id)).toEqual([first.id]);
    });

    it('should include the project name when fetching one invoice', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);
      const details = await invoiceService.findById(invoice.id);

      expect(details.project_name).toBe('Alpha');
      expect(details.client_name).toBe('Acme Builders');
    });
  });

  describe('update', () => {
    it('should recompute the payment status when the amount changes', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);
      await paymentService.recordPayment(invoice.id, { amount: 600, payment_date: '2025-05-01' }, TEST_USER_ID);

      const updated = await invoiceService.update(invoice.id, { amount: 600 }, TEST_USER_ID);

      expect(updated.amount).toBe(600);
      expect(updated.payment_status).toBe('fully_paid');
    });

    it('should reject an amount below what has been paid', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);
      await paymentService.recordPayment(invoice.id, { amount: 600, payment_date: '2025-05-01' }, TEST_USER_ID);

      await expect(invoiceService.update(invoice.id, { amount: 500 }, TEST_USER_ID)).rejects.toThrow(
        'Invoice amount cannot be less than the total paid amount (600)'
      );
      expect((await invoiceService.findById(invoice.id)).amount).toBe(1000);
    });

    it('should update descriptive fields only', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);
      const updated = await invoiceService.update(
        invoice.id,
        { client_name: 'Acme Infra', due_date: '2025-06-01' },
        TEST_USER_ID
      );

      expect(updated.client_name).toBe('Acme Infra');
      expect(updated.due_date).toBe('2025-06-01');
      expect(updated.payment_status).toBe('not_paid');
    });
  });

  describe('status and delete', () => {
    it('should mark an invoice as received and log it', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);

      expect(await invoiceService.updateStatus(invoice.id, 'received', TEST_USER_ID)).toEqual({
        id: invoice.id,
        status: 'received',
      });
      expect(store.tables.logs.at(-1)?.action).toBe('Status Update');
    });

    it('should hide deleted invoices', async () => {
      const invoice = await invoiceService.create(invoiceRequest(), null, TEST_USER_ID);

      expect(await invoiceService.delete(invoice.id, TEST_USER_ID)).toEqual({ deleted_invoice_id: invoice.id });
      await expect(invoiceService.findById(invoice.id)).rejects.toThrow('Invoice not found');
      expect(await invoiceService.findAll()).toEqual([]);
    });
  });
});
