// Project-related models

/**
 * Which running balance of a project an adjustment applies to.
 */
export type BalanceType = 'po' | 'estimated' | 'actual';

export const BALANCE_TYPES: readonly BalanceType[] = ['po', 'estimated', 'actual'];

/**
 * Project entity as stored in the `projects` table.
 * The three balances are informational running totals; no constraint ties them to POs or invoices.
 *
 * @example
 * const project: Project = {
 *   id: 'project-uuid',
 *   name: 'Riverside Warehouse',
 *   start_date: '2025-01-01',
 *   end_date: '2025-12-31',
 *   po_balance: 2000,
 *   // ... other fields
 * };
 */
export interface Project {
  id: string;
  name: string;
  description: string | null;
  location: string | null;
  start_date: string | null;
  end_date: string | null;
  po_balance: number;
  estimated_balance: number;
  actual_balance: number;
  created_by: string;
  created_at: Date;
  updated_at: Date;
  is_deleted: boolean;
}

export interface NewProject {
  id: string;
  name: string;
  description: string | null;
  location: string | null;
  start_date: string | null;
  end_date: string | null;
  po_balance: number;
  estimated_balance: number;
  actual_balance: number;
  created_by: string;
}

export type ProjectChanges = Partial<
  Pick<
    Project,
    'name' | 'description' | 'location' | 'start_date' | 'end_date' | 'po_balance' | 'estimated_balance' | 'actual_balance'
  >
>;

export interface ProjectBalanceEntry {
  id: string;
  project_id: string;
  adjustment: number;
  balance_type: BalanceType;
  description: string | null;
  created_at: Date;
}

export type NewProjectBalanceEntry = Omit<ProjectBalanceEntry, 'id' | 'created_at'>;

/**
 * Purchase order attached to a project.
 * `po_number` is optional but unique among the project's non-deleted POs when present.
 * `file_path` is the stored path of the bound document (e.g. `uploads/po_documents/PO_...pdf`).
 */
export interface ProjectPO {
  id: string;
  project_id: string;
  po_number: string | null;
  amount: number;
  description: string | null;
  file_path: string | null;
  created_by: string;
  created_at: Date;
  updated_at: Date;
  is_deleted: boolean;
}

export type NewProjectPO = Pick<ProjectPO, 'project_id' | 'po_number' | 'amount' | 'description' | 'file_path' | 'created_by'>;

export type ProjectPOChanges = Partial<Pick<ProjectPO, 'po_number' | 'amount' | 'description' | 'file_path'>>;

/**
 * PO descriptor as submitted in a project-creation batch or an add-PO request.
 * `file_index` selects the `po_document_<i>` upload; it defaults to the descriptor's position.
 */
export interface PODescriptor {
  po_number?: string | null;
  amount: number;
  description?: string | null;
  file_index?: number | null;
}

export interface CreateProjectRequest {
  name: string;
  description?: string | null;
  location?: string | null;
  start_date?: string | null;
  end_date?: string | null;
  po_balance: number;
  estimated_balance: number;
  actual_balance: number;
  pos: PODescriptor[];
}

export type UpdateProjectRequest = ProjectChanges;

export interface AddPORequest {
  po_number?: string | null;
  amount: number;
  description?: string | null;
}

export interface UpdatePORequest {
  po_number?: string | null;
  amount?: number;
  description?: string | null;
}

export interface BalanceAdjustmentRequest {
  adjustment: number;
  balance_type: BalanceType;
  description?: string | null;
}
