import { ProjectPOService } from '../../src/services/business/project-po.service';
import { ProjectService } from '../../src/services/business/project.service';
import { InvoiceService } from '../../src/services/financial/invoice.service';
import { DocumentStorage } from '../../src/services/storage/document-storage.service';
import { NotFoundError } from '../../src/utils/errors';
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

describe('ProjectPOService', () => {
  let root: string;
  let store: InMemoryDataStore;
  let poService: ProjectPOService;
  let invoiceService: InvoiceService;
  let projectId: string;

  beforeEach(async () => {
    root = await createUploadRoot();
    store = new InMemoryDataStore();
    const storage = new DocumentStorage(root);
    const options = { documents: testPolicy, hostUrl: TEST_HOST_URL };
    poService = new ProjectPOService(store, storage, options);
    invoiceService = new InvoiceService(store, storage, options);

    const projectService = new ProjectService(store, storage, options);
    const { project } = await projectService.create(
      projectRequest({ pos: [{ po_number: 'PO-100', amount: 1200, description: 'Steel' }] }),
      new Map([[0, makeDocument('steel.pdf')]]),
      TEST_USER_ID
    );
    projectId = project.id;
  });

  afterEach(async () => {
    await removeUploadRoot(root);
  });

  describe('add', () => {
    it('should add a PO with a document', async () => {
      const po = await poService.add(
        projectId,
        { po_number: 'PO-200', amount: 300, description: 'Cement' },
        makeDocument('cement.jpg'),
        TEST_USER_ID
      );

      expect(po.po_number).toBe('PO-200');
      expect(po.amount).toBe(300);
      expect(po.file_path?.startsWith(`uploads/po_documents/PO_${projectId}_PO-200_`)).toBe(true);
      expect(po.file_url).toBe(`${TEST_HOST_URL}/${po.file_path}`);
      expect(await listFiles(root)).toHaveLength(2);
    });

    it('should add a PO without a number or document', async () => {
      const po = await poService.add(projectId, { amount: 50 }, null, TEST_USER_ID);

      expect(po.po_number).toBeNull();
      expect(po.file_path).toBeNull();
      expect(po.has_document).toBe(false);
    });

    it('should reject a PO number already used in the project', async () => {
      await expect(
        poService.add(projectId, { po_number: 'PO-100', amount: 10 }, makeDocument('dup.pdf'), TEST_USER_ID)
      ).rejects.toThrow("PO number 'PO-100' already exists in this project");

      expect(await listFiles(root)).toHaveLength(1);
    });

    it('should reject a disallowed document before writing anything', async () => {
      await expect(poService.add(projectId, { amount: 10 }, makeDocument('run.sh'), TEST_USER_ID)).rejects.toThrow(
        'File type .sh not allowed.'
      );
      expect(store.tables.pos).toHaveLength(1);
    });

    it('should return 404 for an unknown project', async () => {
      await expect(
        poService.add('6f1c2c1e-8d7a-4a7e-9a55-1c2b3d4e5f60', { amount: 10 }, null, TEST_USER_ID)
      ).rejects.toThrow(NotFoundError);
    });
  });

  describe('list', () => {
    it('should return the project POs with a summary and resolvable URLs', async () => {
      await poService.add(projectId, { po_number: 'PO-200', amount: 300.25 }, null, TEST_USER_ID);

      const result = await poService.list(projectId);

      expect(result.project_id).toBe(projectId);
      expect(result.project_name).toBe('Riverside Warehouse');
      expect(result.po_summary).toEqual({ total_pos: 2, total_amount: 1500.25, files_uploaded: 1, files_missing: 1 });
      expect(result.pos.map((po) => [po.po_number, po.amount, po.description])).toEqual([
        ['PO-100', 1200, 'Steel'],
        ['PO-200', 300.25, null],
      ]);
      expect(result.pos[0].file_url).toBe(`${TEST_HOST_URL}/${result.pos[0].file_path}`);
    });
  });

  describe('update', () => {
    it('should update amount and description', async () => {
      const [po] = (await poService.list(projectId)).pos;

      const updated = await poService.update(projectId, po.id, { amount: 1500, description: 'Steel, revised' }, TEST_USER_ID);

      expect(updated.amount).toBe(1500);
      expect(updated.description).toBe('Steel, revised');
      expect(updated.po_number).toBe('PO-100');
    });

    it('should reject a non-positive amount', async () => {
      const [po] = (await poService.list(projectId)).pos;
      await expect(poService.update(projectId, po.id, { amount: -1 }, TEST_USER_ID)).rejects.toThrow(
        'Amount must be greater than 0'
      );
    });

    it('should reject renaming onto another PO number', async () => {
      const other = await poService.add(projectId, { po_number: 'PO-200', amount: 10 }, null, TEST_USER_ID);
      await expect(poService.update(projectId, other.id, { po_number: 'PO-100' }, TEST_USER_ID)).rejects.toThrow(
        "PO number 'PO-100' already exists in this project"
      );
    });

    it('should return 404 for a PO of another project', async () => {
      const [po] = (await poService.list(projectId)).pos;
      await expect(
        poService.update('6f1c2c1e-8d7a-4a7e-9a55-1c2b3d4e5f60', po.id, { amount: 5 }, TEST_USER_ID)
      ).rejects.toThrow('PO not found');
    });
  });

  describe('delete', () => {
    it('should refuse to delete a PO with invoices and keep it active', async () => {
      const [po] = (await poService.list(projectId)).pos;
      await invoiceService.create(
        {
          project_id: projectId,
          project_po_id: po.id,
          client_name: 'Acme Builders',
          invoice_item: 'Steel beams',
          amount: 1000,
          due_date: '2025-05-01',
        },
        null,
        TEST_USER_ID
      );

      await expect(poService.delete(projectId, po.id, TEST_USER_ID)).rejects.toThrow(
        'Cannot delete PO. It has 1 associated invoice(s). Please delete or reassign the invoices first.'
      );
      expect((await poService.list(projectId)).pos).toHaveLength(1);
    });

    it('should soft delete a PO once its invoices are deleted', async () => {
      const [po] = (await poService.list(projectId)).pos;
      const invoice = await invoiceService.create(
        {
          project_id: projectId,
          project_po_id: po.id,
          client_name: 'Acme Builders',
          invoice_item: 'Steel beams',
          amount: 1000,
          due_date: '2025-05-01',
        },
        null,
        TEST_USER_ID
      );
      await invoiceService.delete(invoice.id, TEST_USER_ID);

      expect(await poService.delete(projectId, po.id, TEST_USER_ID)).toEqual({ deleted_po_id: po.id });
      expect((await poService.list(projectId)).pos).toEqual([]);
      expect(store.tables.pos[0].is_deleted).toBe(true);
    });
  });
});
