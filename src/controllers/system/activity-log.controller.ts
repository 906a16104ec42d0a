import { Request, Response } from 'express';
import { validateSchema } from '../../schemas/common.schema';
import { activityLogQuerySchema } from '../../schemas/system/activity-log.schema';
import { ActivityLogService } from '../../services/system/activity-log.service';
import { sendError, sendResponse } from '../../utils/response';

export class ActivityLogController {
  constructor(private readonly activityLogService: ActivityLogService) {}

  // GET /logs
  async list(req: Request, res: Response): Promise<void> {
    try {
      const filters = validateSchema(activityLogQuerySchema, req.query);
      const logs = await this.activityLogService.list(filters);
      sendResponse(res, 200, 'Logs fetched successfully', logs);
    } catch (error) {
      sendError(res, error, 'fetching logs');
    }
  }
}
