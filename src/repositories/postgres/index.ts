import { withClient, withTransaction } from '../../utils/database';
import { DataStore, Repositories } from '../types';
import { PgActivityLogRepository } from './activity-log.repository';
import { PgInvoicePaymentRepository } from './invoice-payment.repository';
import { PgInvoiceRepository } from './invoice.repository';
import { PgProjectBalanceRepository } from './project-balance.repository';
import { PgProjectPORepository } from './project-po.repository';
import { PgProjectRepository } from './project.repository';
import { SqlClient } from './sql';

export const createRepositories = (client: SqlClient): Repositories => ({
  projects: new PgProjectRepository(client),
  balances: new PgProjectBalanceRepository(client),
  pos: new PgProjectPORepository(client),
  invoices: new PgInvoiceRepository(client),
  payments: new PgInvoicePaymentRepository(client),
  logs: new PgActivityLogRepository(client),
});

/**
 * PostgreSQL-backed data store. Each unit of work borrows one client from the shared pool.
 */
export class PgDataStore implements DataStore {
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return withTransaction((client) => work(createRepositories(client)));
  }

  read<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return withClient((client) => work(createRepositories(client)));
  }
}
