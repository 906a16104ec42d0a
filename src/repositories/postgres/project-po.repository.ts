import { NewProjectPO, ProjectPO, ProjectPOChanges } from '../../models/business/project.model';
import { ValidationError } from '../../utils/errors';
import { ProjectPORepository } from '../types';
import { mapProjectPO } from './mappers';
import { buildSetClause, isUniqueViolation, SqlClient } from './sql';

// Raised by the partial unique index on (project_id, po_number) when two requests race past the service check
const duplicateNumberError = (poNumber: string | null | undefined): ValidationError =>
  new ValidationError(`PO number '${poNumber ?? ''}' already exists in this project`);

const PO_COLUMNS = `
  id, project_id, po_number, amount, description, file_path,
  created_by, created_at, updated_at, is_deleted
`;

export class PgProjectPORepository implements ProjectPORepository {
  constructor(private readonly db: SqlClient) {}

  async insert(po: NewProjectPO): Promise<ProjectPO> {
    const result = await this.queryGuardingNumber(
      `
      INSERT INTO project_pos (project_id, po_number, amount, description, file_path, created_by)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${PO_COLUMNS}
      `,
      [po.project_id, po.po_number, po.amount, po.description, po.file_path, po.created_by],
      po.po_number
    );
    return mapProjectPO(result.rows[0]);
  }

  async findActiveById(projectId: string, poId: string): Promise<ProjectPO | null> {
    const result = await this.db.query(
      `SELECT ${PO_COLUMNS} FROM project_pos WHERE id = $1 AND project_id = $2 AND is_deleted = FALSE`,
      [poId, projectId]
    );
    return result.rows.length > 0 ? mapProjectPO(result.rows[0]) : null;
  }

  async findActiveByProject(projectId: string): Promise<ProjectPO[]> {
    const result = await this.db.query(
      `
      SELECT ${PO_COLUMNS}
      FROM project_pos
      WHERE project_id = $1 AND is_deleted = FALSE
      ORDER BY created_at ASC, id ASC
      `,
      [projectId]
    );
    return result.rows.map(mapProjectPO);
  }

  async findActiveByNumber(projectId: string, poNumber: string): Promise<ProjectPO | null> {
    const result = await this.db.query(
      `
      SELECT ${PO_COLUMNS}
      FROM project_pos
      WHERE project_id = $1 AND po_number = $2 AND is_deleted = FALSE
      LIMIT 1
      `,
      [projectId, poNumber]
    );
    return result.rows.length > 0 ? mapProjectPO(result.rows[0]) : null;
  }

  async update(id: string, changes: ProjectPOChanges): Promise<ProjectPO> {
    const { setParts, values, nextParam } = buildSetClause(changes);
    setParts.push('updated_at = CURRENT_TIMESTAMP');

    const result = await this.queryGuardingNumber(
      `
      UPDATE project_pos
      SET ${setParts.join(', ')}
      WHERE id = $${nextParam}
      RETURNING ${PO_COLUMNS}
      `,
      [...values, id],
      changes.po_number
    );
    if (result.rows.length === 0) {
      throw new Error(`PO ${id} disappeared during update`);
    }
    return mapProjectPO(result.rows[0]);
  }

  async softDelete(id: string): Promise<void> {
    await this.db.query(
      `UPDATE project_pos SET is_deleted = TRUE, updated_at = CURRENT_TIMESTAMP WHERE id = $1`,
      [id]
    );
  }

  private async queryGuardingNumber(text: string, values: unknown[], poNumber: string | null | undefined) {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      if (isUniqueViolation(error)) throw duplicateNumberError(poNumber);
      throw error;
    }
  }
}
