import { AddPORequest, ProjectPO, ProjectPOChanges, UpdatePORequest } from '../../models/business/project.model';
import { DataStore, Repositories } from '../../repositories/types';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { roundCurrency } from '../financial/payment-status';
import { DocumentStorage, StagedDocument } from '../storage/document-storage.service';
import { buildDocumentFilename, DocumentPolicy, UploadedDocument, validateDocument } from './po-binder';
import { PO_DOCUMENT_FOLDER, POView, toPOView } from './project.service';

export interface ProjectPOList {
  project_id: string;
  project_name: string;
  po_summary: {
    total_pos: number;
    total_amount: number;
    files_uploaded: number;
    files_missing: number;
  };
  pos: POView[];
}

export interface ProjectPOServiceOptions {
  documents: DocumentPolicy;
  hostUrl: string;
}

/**
 * Manages the POs of an existing project.
 */
export class ProjectPOService {
  constructor(
    private readonly store: DataStore,
    private readonly storage: DocumentStorage,
    private readonly options: ProjectPOServiceOptions
  ) {}

  async add(projectId: string, request: AddPORequest, document: UploadedDocument | null, userId: string): Promise<POView> {
    if (!(request.amount > 0)) {
      throw new ValidationError('Amount must be greater than 0');
    }

    const staged: StagedDocument[] = [];
    if (document) {
      validateDocument(document, this.options.documents);
      const name = buildDocumentFilename(projectId, request.po_number, 'PO', document.originalname);
      staged.push(await this.storage.stage(PO_DOCUMENT_FOLDER, name, document.buffer));
    }

    const po = await this.storage.commitWithDocuments(staged, () =>
      this.store.transaction(async (repos) => {
        const project = await repos.projects.findActiveById(projectId);
        if (!project) {
          throw new NotFoundError('Project not found');
        }
        const poNumber = request.po_number ?? null;
        await this.assertNumberAvailable(repos, project.id, poNumber, null);

        const created = await repos.pos.insert({
          project_id: project.id,
          po_number: poNumber,
          amount: request.amount,
          description: request.description ?? null,
          file_path: staged.length > 0 ? staged[0].storedPath : null,
          created_by: userId,
        });
        await repos.logs.record({ entity: 'ProjectPO', action: 'Create', entity_id: created.id, performed_by: userId });
        return created;
      })
    );

    return toPOView(po, this.options.hostUrl);
  }

  async list(projectId: string): Promise<ProjectPOList> {
    return this.store.read(async (repos) => {
      const project = await repos.projects.findActiveById(projectId);
      if (!project) {
        throw new NotFoundError('Project not found');
      }

      const pos = await repos.pos.findActiveByProject(project.id);
      const filesUploaded = pos.filter((po) => po.file_path !== null).length;
      return {
        project_id: project.id,
        project_name: project.name,
        po_summary: {
          total_pos: pos.length,
          total_amount: roundCurrency(pos.reduce((sum, po) => sum + po.amount, 0)),
          files_uploaded: filesUploaded,
          files_missing: pos.length - filesUploaded,
        },
        pos: pos.map((po) => toPOView(po, this.options.hostUrl)),
      };
    });
  }

  async update(projectId: string, poId: string, request: UpdatePORequest, userId: string): Promise<POView> {
    if (request.amount !== undefined && !(request.amount > 0)) {
      throw new ValidationError('Amount must be greater than 0');
    }
    const changes: ProjectPOChanges = {
      po_number: request.po_number,
      amount: request.amount,
      description: request.description,
    };
    if (Object.values(changes).every((value) => value === undefined)) {
      throw new ValidationError('No fields provided for update');
    }

    const updated = await this.store.transaction(async (repos) => {
      const po = await this.requirePO(repos, projectId, poId);
      if (changes.po_number !== undefined && changes.po_number !== po.po_number) {
        await this.assertNumberAvailable(repos, projectId, changes.po_number, po.id);
      }

      const result = await repos.pos.update(po.id, changes);
      await repos.logs.record({ entity: 'ProjectPO', action: 'Update', entity_id: po.id, performed_by: userId });
      return result;
    });

    return toPOView(updated, this.options.hostUrl);
  }

  /**
   * Soft-deletes a PO. Refused while non-deleted invoices still reference it.
   */
  async delete(projectId: string, poId: string, userId: string): Promise<{ deleted_po_id: string }> {
    return this.store.transaction(async (repos) => {
      const po = await this.requirePO(repos, projectId, poId);
      const invoiceCount = await repos.invoices.countActiveByPO(po.id);
      if (invoiceCount > 0) {
        throw new ValidationError(
          `Cannot delete PO. It has ${invoiceCount} associated invoice(s). Please delete or reassign the invoices first.`
        );
      }

      await repos.pos.softDelete(po.id);
      await repos.logs.record({ entity: 'ProjectPO', action: 'Delete', entity_id: po.id, performed_by: userId });
      return { deleted_po_id: po.id };
    });
  }

  private async requirePO(repos: Repositories, projectId: string, poId: string): Promise<ProjectPO> {
    const po = await repos.pos.findActiveById(projectId, poId);
    if (!po) {
      throw new NotFoundError('PO not found');
    }
    return po;
  }

  private async assertNumberAvailable(
    repos: Repositories,
    projectId: string,
    poNumber: string | null,
    exceptPoId: string | null
  ): Promise<void> {
    if (poNumber === null) return;
    const existing = await repos.pos.findActiveByNumber(projectId, poNumber);
    if (existing && existing.id !== exceptPoId) {
      throw new ValidationError(`PO number '${poNumber}' already exists in this project`);
    }
  }
}
