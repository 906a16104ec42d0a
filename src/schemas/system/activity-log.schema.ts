import * as Joi from 'joi';
import { ActivityLogFilters, LOGGED_ACTIONS, LOGGED_ENTITIES } from '../../models/system/activity-log.model';
import { calendarDateSchema, uuidSchema } from '../common.schema';

export const activityLogQuerySchema = Joi.object<ActivityLogFilters>({
  entity: Joi.string().valid(...LOGGED_ENTITIES),
  action: Joi.string().valid(...LOGGED_ACTIONS),
  entity_id: uuidSchema,
  performed_by: Joi.string().trim().max(255),
  start_date: calendarDateSchema,
  end_date: calendarDateSchema,
});
