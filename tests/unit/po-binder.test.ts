import {
  bindPurchaseOrderDocuments,
  buildDocumentFilename,
  collectIndexedDocuments,
  describeFileBinding,
  validateDocument,
} from '../../src/services/business/po-binder';
import { ValidationError } from '../../src/utils/errors';
import { makeDocument, testPolicy } from '../helpers/fixtures';

describe('PO binder', () => {
  describe('bindPurchaseOrderDocuments', () => {
    it('should bind each descriptor to the document at its own position by default', () => {
      const plan = makeDocument('plan.pdf');
      const bindings = bindPurchaseOrderDocuments(
        [
          { po_number: 'PO-A', amount: 1000 },
          { po_number: 'PO-B', amount: 500 },
        ],
        new Map([[0, plan]]),
        testPolicy
      );

      expect(bindings.map((b) => b.fileIndex)).toEqual([0, 1]);
      expect(bindings[0].document).toBe(plan);
      expect(bindings[1].document).toBeNull();
    });

    it('should honour an explicit file_index over the position', () => {
      const quote = makeDocument('quote.xlsx');
      const bindings = bindPurchaseOrderDocuments(
        [
          { po_number: 'PO-A', amount: 100, file_index: 3 },
          { po_number: 'PO-B', amount: 200 },
        ],
        new Map([[3, quote]]),
        testPolicy
      );

      expect(bindings[0].fileIndex).toBe(3);
      expect(bindings[0].document).toBe(quote);
      expect(bindings[1].fileIndex).toBe(1);
      expect(bindings[1].document).toBeNull();
    });

    it('should not range-check the implicit position of a descriptor', () => {
      const descriptors = Array.from({ length: 3 }, (_, i) => ({ amount: i + 1 }));
      const bindings = bindPurchaseOrderDocuments(descriptors, new Map([[2, makeDocument('a.pdf')]]), {
        ...testPolicy,
        maxDocuments: 2,
      });

      expect(bindings[2].fileIndex).toBe(2);
      expect(bindings[2].document).not.toBeNull();
    });

    it('should reject a non-positive amount naming the PO', () => {
      expect(() =>
        bindPurchaseOrderDocuments([{ amount: 10 }, { amount: 0 }], new Map(), testPolicy)
      ).toThrow('PO 2: Amount must be greater than 0');
    });

    it('should reject a file_index outside the supported range', () => {
      expect(() => bindPurchaseOrderDocuments([{ amount: 10, file_index: 20 }], new Map(), testPolicy)).toThrow(
        'PO 1: Invalid file_index 20. Must be between 0-19'
      );
      expect(() => bindPurchaseOrderDocuments([{ amount: 10, file_index: -1 }], new Map(), testPolicy)).toThrow(
        'PO 1: Invalid file_index -1. Must be between 0-19'
      );
    });

    it('should reject duplicated PO numbers within the batch', () => {
      expect(() =>
        bindPurchaseOrderDocuments(
          [
            { po_number: 'PO-7', amount: 10 },
            { po_number: 'PO-7', amount: 20 },
          ],
          new Map(),
          testPolicy
        )
      ).toThrow("PO number 'PO-7' is duplicated. Each PO must have a unique number.");
    });

    it('should allow several POs without a number', () => {
      const bindings = bindPurchaseOrderDocuments(
        [
          { po_number: null, amount: 10 },
          { amount: 20 },
        ],
        new Map(),
        testPolicy
      );
      expect(bindings).toHaveLength(2);
    });

    it('should report the first failing descriptor in list order', () => {
      expect(() =>
        bindPurchaseOrderDocuments(
          [
            { po_number: 'X', amount: 10, file_index: 25 },
            { po_number: 'X', amount: -5 },
          ],
          new Map(),
          testPolicy
        )
      ).toThrow('PO 1: Invalid file_index 25. Must be between 0-19');
    });

    it('should validate bound documents after all descriptors pass', () => {
      const run = () =>
        bindPurchaseOrderDocuments(
          [{ amount: 10 }, { amount: 20 }],
          new Map([[1, makeDocument('virus.exe')]]),
          testPolicy
        );

      expect(run).toThrow(ValidationError);
      expect(run).toThrow(
        'PO 2: File type .exe not allowed. Allowed types: .pdf, .doc, .docx, .jpg, .jpeg, .png, .txt, .xlsx, .xls'
      );
    });
  });

  describe('validateDocument', () => {
    it('should accept allowed extensions regardless of case', () => {
      expect(() => validateDocument(makeDocument('SCAN.PDF'), testPolicy)).not.toThrow();
    });

    it('should reject a file without extension', () => {
      expect(() => validateDocument(makeDocument('README'), { ...testPolicy, allowedExtensions: ['.pdf'] })).toThrow(
        'File type (none) not allowed. Allowed types: .pdf'
      );
    });

    it('should reject an empty file', () => {
      expect(() => validateDocument(makeDocument('empty.pdf', ''), testPolicy, 'PO 3')).toThrow(
        'PO 3: Uploaded file is empty'
      );
    });

    it('should reject a file over the size limit', () => {
      const big = makeDocument('big.pdf', 'x'.repeat(11));
      expect(() => validateDocument(big, { ...testPolicy, maxFileSizeBytes: 10 })).toThrow(
        'File size exceeds 0MB limit'
      );
      expect(() => validateDocument(makeDocument('ok.pdf', 'x'.repeat(10)), { ...testPolicy, maxFileSizeBytes: 10 })).not.toThrow();
    });
  });

  describe('collectIndexedDocuments', () => {
    it('should key po_document_<i> fields by index and ignore others', () => {
      const first = makeDocument('a.pdf');
      const third = makeDocument('c.pdf');
      const documents = collectIndexedDocuments(
        { po_document_0: [first], po_document_2: [third], invoice_file: [makeDocument('x.pdf')] },
        20
      );

      expect([...documents.keys()]).toEqual([0, 2]);
      expect(documents.get(2)).toBe(third);
    });

    it('should return an empty map when nothing was uploaded', () => {
      expect(collectIndexedDocuments(undefined, 20).size).toBe(0);
    });
  });

  describe('buildDocumentFilename', () => {
    it('should embed the project, a path-safe PO number and the extension', () => {
      expect(buildDocumentFilename('proj-1', 'PO/2025\\7', 'PO1', 'Quote.PDF', 'fixed-id')).toBe(
        'PO_proj-1_PO_2025_7_fixed-id.pdf'
      );
    });

    it('should fall back when the PO has no number', () => {
      expect(buildDocumentFilename('proj-1', null, 'PO2', 'scan.png', 'fixed-id')).toBe('PO_proj-1_PO2_fixed-id.png');
    });
  });

  describe('describeFileBinding', () => {
    it('should summarise bound and unbound descriptors', () => {
      const doc = makeDocument('plan.pdf', 'abc');
      expect(describeFileBinding({ position: 0, descriptor: { amount: 1 }, fileIndex: 0, document: doc })).toEqual({
        file_index: 0,
        original_filename: 'plan.pdf',
        file_size_bytes: 3,
        successfully_bound: true,
      });
      expect(describeFileBinding({ position: 1, descriptor: { amount: 1 }, fileIndex: 1, document: null })).toEqual({
        file_index: 1,
        original_filename: null,
        file_size_bytes: null,
        successfully_bound: false,
      });
    });
  });
});
