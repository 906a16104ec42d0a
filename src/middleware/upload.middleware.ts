import { Request } from 'express';
import multer from 'multer';
import { UploadConfig } from '../config';
import { collectIndexedDocuments, PO_DOCUMENT_FIELD_PREFIX, UploadedDocument } from '../services/business/po-binder';

/**
 * Multer instances for the multipart endpoints. Files are kept in memory and only written
 * to disk by DocumentStorage once validated.
 */
export const createUploadMiddleware = (uploads: UploadConfig) => {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: uploads.maxFileSizeBytes },
  });

  const poDocumentFields = Array.from({ length: uploads.maxPoDocuments }, (_, i) => ({
    name: `${PO_DOCUMENT_FIELD_PREFIX}${i}`,
    maxCount: 1,
  }));

  return {
    projectCreation: upload.fields(poDocumentFields),
    poDocument: upload.single('po_document'),
    invoiceFile: upload.single('invoice_file'),
    none: upload.none(),
  };
};

export type UploadMiddleware = ReturnType<typeof createUploadMiddleware>;

/**
 * `po_document_<i>` uploads of the request, keyed by `i`.
 */
export const getIndexedDocuments = (req: Request, maxDocuments: number): Map<number, UploadedDocument> => {
  const files = req.files && !Array.isArray(req.files) ? req.files : undefined;
  return collectIndexedDocuments(files, maxDocuments);
};

export const getSingleDocument = (req: Request): UploadedDocument | null => req.file ?? null;
