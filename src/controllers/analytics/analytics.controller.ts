import { Request, Response } from 'express';
import { projectParamsSchema } from '../../schemas/business/project.schema';
import { validateSchema } from '../../schemas/common.schema';
import { AnalyticsService } from '../../services/analytics/analytics.service';
import { sendError, sendResponse } from '../../utils/response';

export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  // GET /projects/:projectId/invoice-analytics
  async getInvoiceAnalytics(req: Request, res: Response): Promise<void> {
    try {
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const analytics = await this.analyticsService.getProjectInvoiceAnalytics(projectId);
      sendResponse(res, 200, 'Invoice analytics fetched successfully', analytics);
    } catch (error) {
      sendError(res, error, 'fetching invoice analytics');
    }
  }
}
