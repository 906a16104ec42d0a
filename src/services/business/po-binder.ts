import { randomUUID } from 'crypto';
import path from 'path';
import { PODescriptor } from '../../models/business/project.model';
import { ValidationError } from '../../utils/errors';

/**
 * The parts of an uploaded file the binder needs. Multer's file objects satisfy it.
 */
export interface UploadedDocument {
  originalname: string;
  size: number;
  buffer: Buffer;
}

export interface DocumentPolicy {
  maxDocuments: number;
  maxFileSizeBytes: number;
  allowedExtensions: string[];
}

export interface FileBinding {
  file_index: number;
  original_filename: string | null;
  file_size_bytes: number | null;
  successfully_bound: boolean;
}

export interface POBinding {
  position: number;
  descriptor: PODescriptor;
  fileIndex: number;
  document: UploadedDocument | null;
}

export const PO_DOCUMENT_FIELD_PREFIX = 'po_document_';

/**
 * Picks `po_document_<i>` fields out of a multer `fields()` result, keyed by `i`.
 */
export const collectIndexedDocuments = (
  files: Record<string, UploadedDocument[]> | undefined,
  maxDocuments: number
): Map<number, UploadedDocument> => {
  const documents = new Map<number, UploadedDocument>();
  if (!files) return documents;

  for (let i = 0; i < maxDocuments; i++) {
    const [first] = files[`${PO_DOCUMENT_FIELD_PREFIX}${i}`] ?? [];
    if (first) documents.set(i, first);
  }
  return documents;
};

const formatMegabytes = (bytes: number): string => String(Number((bytes / (1024 * 1024)).toFixed(2)));

/**
 * Throws a ValidationError when the document breaks the policy, prefixed with `label` when given.
 */
export const validateDocument = (document: UploadedDocument, policy: DocumentPolicy, label?: string): void => {
  const prefix = label ? `${label}: ` : '';
  const ext = path.extname(document.originalname).toLowerCase();
  if (!policy.allowedExtensions.includes(ext)) {
    throw new ValidationError(
      `${prefix}File type ${ext || '(none)'} not allowed. Allowed types: ${policy.allowedExtensions.join(', ')}`
    );
  }
  if (document.size <= 0 || document.buffer.length === 0) {
    throw new ValidationError(`${prefix}Uploaded file is empty`);
  }
  if (document.size > policy.maxFileSizeBytes) {
    throw new ValidationError(`${prefix}File size exceeds ${formatMegabytes(policy.maxFileSizeBytes)}MB limit`);
  }
};

/**
 * Validates a batch of PO descriptors and binds each to the upload at its effective
 * file index (explicit `file_index`, else its own position).
 *
 * Checks run per descriptor in list order (amount, file index, duplicate number),
 * then every bound document is checked. The first failure rejects the whole batch.
 */
export const bindPurchaseOrderDocuments = (
  descriptors: PODescriptor[],
  documents: Map<number, UploadedDocument>,
  policy: DocumentPolicy
): POBinding[] => {
  const seenNumbers = new Set<string>();
  const bindings: POBinding[] = [];

  descriptors.forEach((descriptor, position) => {
    const label = `PO ${position + 1}`;

    if (!(descriptor.amount > 0)) {
      throw new ValidationError(`${label}: Amount must be greater than 0`);
    }

    const explicitIndex = descriptor.file_index;
    if (explicitIndex !== undefined && explicitIndex !== null) {
      if (!Number.isInteger(explicitIndex) || explicitIndex < 0 || explicitIndex >= policy.maxDocuments) {
        throw new ValidationError(
          `${label}: Invalid file_index ${explicitIndex}. Must be between 0-${policy.maxDocuments - 1}`
        );
      }
    }

    const poNumber = descriptor.po_number;
    if (poNumber !== undefined && poNumber !== null) {
      if (seenNumbers.has(poNumber)) {
        throw new ValidationError(`PO number '${poNumber}' is duplicated. Each PO must have a unique number.`);
      }
      seenNumbers.add(poNumber);
    }

    const fileIndex = explicitIndex ?? position;
    bindings.push({ position, descriptor, fileIndex, document: documents.get(fileIndex) ?? null });
  });

  for (const binding of bindings) {
    if (binding.document) {
      validateDocument(binding.document, policy, `PO ${binding.position + 1}`);
    }
  }

  return bindings;
};

export const describeFileBinding = (binding: POBinding): FileBinding => ({
  file_index: binding.fileIndex,
  original_filename: binding.document?.originalname ?? null,
  file_size_bytes: binding.document?.size ?? null,
  successfully_bound: binding.document !== null,
});

/**
 * `PO_<projectId>_<poNumber or fallback>_<uuid><ext>`, with path separators in the PO number replaced.
 */
export const buildDocumentFilename = (
  projectId: string,
  poNumber: string | null | undefined,
  fallbackNumber: string,
  originalName: string,
  uniqueId: string = randomUUID()
): string => {
  const safeNumber = (poNumber || fallbackNumber).replace(/[/\\]/g, '_');
  const ext = path.extname(originalName).toLowerCase();
  return `PO_${projectId}_${safeNumber}_${uniqueId}${ext}`;
};
