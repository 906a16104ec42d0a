import { ActivityLog, ActivityLogFilters, NewActivityLog } from '../../models/system/activity-log.model';
import { ActivityLogRepository } from '../types';
import { mapActivityLog } from './mappers';
import { SqlClient } from './sql';

export class PgActivityLogRepository implements ActivityLogRepository {
  constructor(private readonly db: SqlClient) {}

  async record(entry: NewActivityLog): Promise<void> {
    await this.db.query(
      `INSERT INTO logs (entity, action, entity_id, performed_by) VALUES ($1, $2, $3, $4)`,
      [entry.entity, entry.action, entry.entity_id, entry.performed_by]
    );
  }

  async findAll(filters: ActivityLogFilters = {}): Promise<ActivityLog[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    const addCondition = (sql: (param: string) => string, value: unknown) => {
      values.push(value);
      conditions.push(sql(`$${values.length}`));
    };

    if (filters.entity) addCondition((p) => `entity = ${p}`, filters.entity);
    if (filters.action) addCondition((p) => `action = ${p}`, filters.action);
    if (filters.entity_id) addCondition((p) => `entity_id = ${p}`, filters.entity_id);
    if (filters.performed_by) addCondition((p) => `performed_by = ${p}`, filters.performed_by);
    if (filters.start_date) addCondition((p) => `timestamp >= ${p}::date`, filters.start_date);
    // end_date covers the whole day
    if (filters.end_date) addCondition((p) => `timestamp < ${p}::date + 1`, filters.end_date);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.db.query(
      `
      SELECT id, entity, action, entity_id, performed_by, timestamp
      FROM logs
      ${where}
      ORDER BY timestamp DESC, id DESC
      `,
      values
    );
    return result.rows.map(mapActivityLog);
  }
}
