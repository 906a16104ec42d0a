import { NewProjectBalanceEntry, ProjectBalanceEntry } from '../../models/business/project.model';
import { ProjectBalanceRepository } from '../types';
import { mapBalanceEntry } from './mappers';
import { SqlClient } from './sql';

export class PgProjectBalanceRepository implements ProjectBalanceRepository {
  constructor(private readonly db: SqlClient) {}

  async insert(entry: NewProjectBalanceEntry): Promise<ProjectBalanceEntry> {
    const result = await this.db.query(
      `
      INSERT INTO project_balances (project_id, adjustment, balance_type, description)
      VALUES ($1, $2, $3, $4)
      RETURNING id, project_id, adjustment, balance_type, description, created_at
      `,
      [entry.project_id, entry.adjustment, entry.balance_type, entry.description]
    );
    return mapBalanceEntry(result.rows[0]);
  }

  async findByProject(projectId: string): Promise<ProjectBalanceEntry[]> {
    const result = await this.db.query(
      `
      SELECT id, project_id, adjustment, balance_type, description, created_at
      FROM project_balances
      WHERE project_id = $1
      ORDER BY created_at ASC
      `,
      [projectId]
    );
    return result.rows.map(mapBalanceEntry);
  }
}
