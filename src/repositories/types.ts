import {
  NewProject,
  NewProjectBalanceEntry,
  NewProjectPO,
  Project,
  ProjectBalanceEntry,
  ProjectChanges,
  ProjectPO,
  ProjectPOChanges,
} from '../models/business/project.model';
import {
  Invoice,
  InvoiceChanges,
  InvoiceFilters,
  InvoicePayment,
  NewInvoice,
  NewInvoicePayment,
} from '../models/financial/invoice.model';
import { ActivityLog, ActivityLogFilters, NewActivityLog } from '../models/system/activity-log.model';

export interface ProjectRepository {
  insert(project: NewProject): Promise<Project>;
  findActiveById(id: string): Promise<Project | null>;
  findAllActive(filters?: { search?: string }): Promise<Project[]>;
  update(id: string, changes: ProjectChanges): Promise<Project>;
  softDelete(id: string): Promise<void>;
}

export interface ProjectBalanceRepository {
  insert(entry: NewProjectBalanceEntry): Promise<ProjectBalanceEntry>;
  findByProject(projectId: string): Promise<ProjectBalanceEntry[]>;
}

export interface ProjectPORepository {
  insert(po: NewProjectPO): Promise<ProjectPO>;
  findActiveById(projectId: string, poId: string): Promise<ProjectPO | null>;
  /** Non-deleted POs of a project, oldest first. */
  findActiveByProject(projectId: string): Promise<ProjectPO[]>;
  findActiveByNumber(projectId: string, poNumber: string): Promise<ProjectPO | null>;
  update(id: string, changes: ProjectPOChanges): Promise<ProjectPO>;
  softDelete(id: string): Promise<void>;
}

export interface InvoiceRepository {
  insert(invoice: NewInvoice): Promise<Invoice>;
  findActiveById(id: string): Promise<Invoice | null>;
  /** Same as findActiveById but holds a row lock until the transaction ends. */
  findActiveByIdForUpdate(id: string): Promise<Invoice | null>;
  findActive(filters?: InvoiceFilters): Promise<Invoice[]>;
  countActiveByPO(poId: string): Promise<number>;
  update(id: string, changes: InvoiceChanges): Promise<Invoice>;
  softDelete(id: string): Promise<void>;
}

export type PaymentOrder = 'asc' | 'desc';

export interface InvoicePaymentRepository {
  insert(payment: NewInvoicePayment): Promise<InvoicePayment>;
  /** Non-deleted payments ordered by payment_date, ties broken by creation time in the same direction. */
  findActiveByInvoice(invoiceId: string, order: PaymentOrder): Promise<InvoicePayment[]>;
  sumActiveByInvoice(invoiceId: string): Promise<number>;
}

export interface ActivityLogRepository {
  record(entry: NewActivityLog): Promise<void>;
  /** Matching entries, most recent first. */
  findAll(filters?: ActivityLogFilters): Promise<ActivityLog[]>;
}

/**
 * Repositories bound to one unit of work (a pooled client inside a transaction, or the pool itself).
 */
export interface Repositories {
  projects: ProjectRepository;
  balances: ProjectBalanceRepository;
  pos: ProjectPORepository;
  invoices: InvoiceRepository;
  payments: InvoicePaymentRepository;
  logs: ActivityLogRepository;
}

/**
 * Entry point to persistence. `transaction` commits when `work` resolves and rolls back when it throws;
 * `read` runs without a transaction.
 */
export interface DataStore {
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
  read<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
