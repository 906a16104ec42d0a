import { randomUUID } from 'crypto';
import {
  BALANCE_TYPES,
  BalanceAdjustmentRequest,
  BalanceType,
  CreateProjectRequest,
  Project,
  ProjectBalanceEntry,
  ProjectChanges,
  ProjectPO,
  UpdateProjectRequest,
} from '../../models/business/project.model';
import { DataStore, Repositories } from '../../repositories/types';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { roundCurrency } from '../financial/payment-status';
import { buildFileUrl, DocumentStorage, StagedDocument } from '../storage/document-storage.service';
import {
  bindPurchaseOrderDocuments,
  buildDocumentFilename,
  describeFileBinding,
  DocumentPolicy,
  FileBinding,
  UploadedDocument,
} from './po-binder';

export const PO_DOCUMENT_FOLDER = 'po_documents';

const BALANCE_COLUMNS = {
  po: 'po_balance',
  estimated: 'estimated_balance',
  actual: 'actual_balance',
} as const satisfies Record<BalanceType, keyof ProjectChanges>;

export interface POView extends ProjectPO {
  file_url: string | null;
  has_document: boolean;
}

export interface CreatedPOView extends POView {
  file_binding: FileBinding;
}

export interface ProjectCreationResult {
  project: Project;
  po_summary: {
    total_pos: number;
    total_po_amount: number;
    files_uploaded: number;
    files_missing: number;
    max_pos_supported: number;
  };
  pos: CreatedPOView[];
}

export interface ProjectDetails extends Project {
  balances: ProjectBalanceEntry[];
}

export interface ProjectServiceOptions {
  documents: DocumentPolicy;
  hostUrl: string;
}

export const toPOView = (po: ProjectPO, hostUrl: string): POView => ({
  ...po,
  file_url: buildFileUrl(hostUrl, po.file_path),
  has_document: po.file_path !== null,
});

/**
 * Service for projects, their running balances and the POs created alongside them.
 */
export class ProjectService {
  constructor(
    private readonly store: DataStore,
    private readonly storage: DocumentStorage,
    private readonly options: ProjectServiceOptions
  ) {}

  /**
   * Creates a project together with its POs and their documents in one unit of work.
   *
   * Every descriptor and bound document is validated before anything is written.
   * Documents are staged, the rows are inserted in a single transaction, and the staged
   * files are moved into place only after it commits. Any failure leaves nothing behind.
   *
   * @param documents - Uploaded files keyed by their `po_document_<i>` position
   */
  async create(
    request: CreateProjectRequest,
    documents: Map<number, UploadedDocument>,
    userId: string
  ): Promise<ProjectCreationResult> {
    if (request.start_date && request.end_date && request.start_date > request.end_date) {
      throw new ValidationError('start_date must be on or before end_date');
    }

    const projectId = randomUUID();
    const bindings = bindPurchaseOrderDocuments(request.pos, documents, this.options.documents);

    const stagedByPosition = new Map<number, StagedDocument>();
    try {
      for (const binding of bindings) {
        if (!binding.document) continue;
        const name = buildDocumentFilename(
          projectId,
          binding.descriptor.po_number,
          `PO${binding.position + 1}`,
          binding.document.originalname
        );
        stagedByPosition.set(
          binding.position,
          await this.storage.stage(PO_DOCUMENT_FOLDER, name, binding.document.buffer)
        );
      }
    } catch (error) {
      await this.storage.discard([...stagedByPosition.values()]);
      throw error;
    }

    const { project, pos } = await this.storage.commitWithDocuments([...stagedByPosition.values()], () =>
      this.store.transaction(async (repos) => {
        const created = await repos.projects.insert({
          id: projectId,
          name: request.name,
          description: request.description ?? null,
          location: request.location ?? null,
          start_date: request.start_date ?? null,
          end_date: request.end_date ?? null,
          po_balance: request.po_balance,
          estimated_balance: request.estimated_balance,
          actual_balance: request.actual_balance,
          created_by: userId,
        });

        for (const balanceType of BALANCE_TYPES) {
          const initial = created[BALANCE_COLUMNS[balanceType]];
          if (initial !== 0) {
            await repos.balances.insert({
              project_id: created.id,
              adjustment: initial,
              balance_type: balanceType,
              description: 'Initial balance',
            });
          }
        }

        const createdPOs: ProjectPO[] = [];
        for (const binding of bindings) {
          const staged = stagedByPosition.get(binding.position);
          const po = await repos.pos.insert({
            project_id: created.id,
            po_number: binding.descriptor.po_number ?? null,
            amount: binding.descriptor.amount,
            description: binding.descriptor.description ?? null,
            file_path: staged ? staged.storedPath : null,
            created_by: userId,
          });
          createdPOs.push(po);
          await repos.logs.record({ entity: 'ProjectPO', action: 'Create', entity_id: po.id, performed_by: userId });
        }

        await repos.logs.record({ entity: 'Project', action: 'Create', entity_id: created.id, performed_by: userId });
        return { project: created, pos: createdPOs };
      })
    );

    const filesUploaded = stagedByPosition.size;
    console.log(`📁 Project ${project.id} created with ${pos.length} PO(s) and ${filesUploaded} document(s)`);

    return {
      project,
      po_summary: {
        total_pos: pos.length,
        total_po_amount: roundCurrency(pos.reduce((sum, po) => sum + po.amount, 0)),
        files_uploaded: filesUploaded,
        files_missing: pos.length - filesUploaded,
        max_pos_supported: this.options.documents.maxDocuments,
      },
      pos: pos.map((po, index) => ({
        ...toPOView(po, this.options.hostUrl),
        file_binding: describeFileBinding(bindings[index]),
      })),
    };
  }

  async findAll(filters: { search?: string } = {}): Promise<Project[]> {
    return this.store.read((repos) => repos.projects.findAllActive(filters));
  }

  async findById(projectId: string): Promise<ProjectDetails> {
    return this.store.read(async (repos) => {
      const project = await this.requireProject(repos, projectId);
      const balances = await repos.balances.findByProject(project.id);
      return { ...project, balances };
    });
  }

  async update(projectId: string, request: UpdateProjectRequest, userId: string): Promise<Project> {
    const changes: ProjectChanges = {
      name: request.name,
      description: request.description,
      location: request.location,
      start_date: request.start_date,
      end_date: request.end_date,
      po_balance: request.po_balance,
      estimated_balance: request.estimated_balance,
      actual_balance: request.actual_balance,
    };
    if (Object.values(changes).every((value) => value === undefined)) {
      throw new ValidationError('No fields provided for update');
    }

    return this.store.transaction(async (repos) => {
      const project = await this.requireProject(repos, projectId);
      const startDate = changes.start_date !== undefined ? changes.start_date : project.start_date;
      const endDate = changes.end_date !== undefined ? changes.end_date : project.end_date;
      if (startDate && endDate && startDate > endDate) {
        throw new ValidationError('start_date must be on or before end_date');
      }

      const updated = await repos.projects.update(project.id, changes);
      await repos.logs.record({ entity: 'Project', action: 'Update', entity_id: project.id, performed_by: userId });
      return updated;
    });
  }

  async delete(projectId: string, userId: string): Promise<{ deleted_project_id: string }> {
    return this.store.transaction(async (repos) => {
      const project = await this.requireProject(repos, projectId);
      await repos.projects.softDelete(project.id);
      await repos.logs.record({ entity: 'Project', action: 'Delete', entity_id: project.id, performed_by: userId });
      return { deleted_project_id: project.id };
    });
  }

  /**
   * Adds `adjustment` to one of the project's running balances and records the entry.
   */
  async adjustBalance(
    projectId: string,
    request: BalanceAdjustmentRequest,
    userId: string
  ): Promise<{ project: Project; entry: ProjectBalanceEntry }> {
    if (request.adjustment === 0) {
      throw new ValidationError('Adjustment must not be zero');
    }

    return this.store.transaction(async (repos) => {
      const project = await this.requireProject(repos, projectId);
      const column = BALANCE_COLUMNS[request.balance_type];

      const changes: ProjectChanges = {};
      changes[column] = roundCurrency(project[column] + request.adjustment);
      const updated = await repos.projects.update(project.id, changes);

      const entry = await repos.balances.insert({
        project_id: project.id,
        adjustment: request.adjustment,
        balance_type: request.balance_type,
        description: request.description ?? null,
      });
      await repos.logs.record({ entity: 'ProjectBalance', action: 'Create', entity_id: entry.id, performed_by: userId });

      return { project: updated, entry };
    });
  }

  async listBalances(projectId: string): Promise<ProjectBalanceEntry[]> {
    return this.store.read(async (repos) => {
      const project = await this.requireProject(repos, projectId);
      return repos.balances.findByProject(project.id);
    });
  }

  private async requireProject(repos: Repositories, projectId: string): Promise<Project> {
    const project = await repos.projects.findActiveById(projectId);
    if (!project) {
      throw new NotFoundError('Project not found');
    }
    return project;
  }
}
