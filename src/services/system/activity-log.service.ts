import { ActivityLog, ActivityLogFilters } from '../../models/system/activity-log.model';
import { DataStore } from '../../repositories/types';
import { ValidationError } from '../../utils/errors';

/**
 * Read access to the audit trail written by the other services.
 */
export class ActivityLogService {
  constructor(private readonly store: DataStore) {}

  async list(filters: ActivityLogFilters = {}): Promise<ActivityLog[]> {
    if (filters.start_date && filters.end_date && filters.start_date > filters.end_date) {
      throw new ValidationError('start_date must not be after end_date');
    }
    return this.store.read((repos) => repos.logs.findAll(filters));
  }
}
