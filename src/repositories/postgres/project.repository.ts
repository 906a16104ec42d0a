import { NewProject, Project, ProjectChanges } from '../../models/business/project.model';
import { ProjectRepository } from '../types';
import { mapProject } from './mappers';
import { buildSetClause, SqlClient } from './sql';

const PROJECT_COLUMNS = `
  id, name, description, location, start_date, end_date,
  po_balance, estimated_balance, actual_balance,
  created_by, created_at, updated_at, is_deleted
`;

export class PgProjectRepository implements ProjectRepository {
  constructor(private readonly db: SqlClient) {}

  async insert(project: NewProject): Promise<Project> {
    const result = await this.db.query(
      `
      INSERT INTO projects (
        id, name, description, location, start_date, end_date,
        po_balance, estimated_balance, actual_balance, created_by
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING ${PROJECT_COLUMNS}
      `,
      [
        project.id,
        project.name,
        project.description,
        project.location,
        project.start_date,
        project.end_date,
        project.po_balance,
        project.estimated_balance,
        project.actual_balance,
        project.created_by,
      ]
    );
    return mapProject(result.rows[0]);
  }

  async findActiveById(id: string): Promise<Project | null> {
    const result = await this.db.query(
      `SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = $1 AND is_deleted = FALSE`,
      [id]
    );
    return result.rows.length > 0 ? mapProject(result.rows[0]) : null;
  }

  async findAllActive(filters?: { search?: string }): Promise<Project[]> {
    const conditions = ['is_deleted = FALSE'];
    const values: unknown[] = [];

    if (filters?.search) {
      values.push(`%${filters.search}%`);
      conditions.push(`name ILIKE $${values.length}`);
    }

    const result = await this.db.query(
      `
      SELECT ${PROJECT_COLUMNS}
      FROM projects
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at DESC
      `,
      values
    );
    return result.rows.map(mapProject);
  }

  async update(id: string, changes: ProjectChanges): Promise<Project> {
    const { setParts, values, nextParam } = buildSetClause(changes);
    setParts.push('updated_at = CURRENT_TIMESTAMP');

    const result = await this.db.query(
      `
      UPDATE projects
      SET ${setParts.join(', ')}
      WHERE id = $${nextParam}
      RETURNING ${PROJECT_COLUMNS}
      `,
      [...values, id]
    );
    if (result.rows.length === 0) {
      throw new Error(`Project ${id} disappeared during update`);
    }
    return mapProject(result.rows[0]);
  }

  async softDelete(id: string): Promise<void> {
    await this.db.query(
      `UPDATE projects SET is_deleted = TRUE, updated_at = CURRENT_TIMESTAMP WHERE id = $1`,
      [id]
    );
  }
}
