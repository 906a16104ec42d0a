import { Router } from 'express';
import { ActivityLogController } from '../../controllers/system/activity-log.controller';
import { authenticateToken, requireRole } from '../../middleware/auth/jwt.middleware';
import { UserRole } from '../../models/auth/user.model';

export const createActivityLogRouter = (logs: ActivityLogController): Router => {
  const router = Router();

  router.use(authenticateToken);

  /**
   * @openapi
   * /logs:
   *   get:
   *     tags:
   *       - Logs
   *     summary: Audit trail of mutations, most recent first
   *     description: Filter by entity, action, entity_id, performed_by and an inclusive start_date/end_date range.
   *     security:
   *       - bearerAuth: []
   */
  router.get(
    '/',
    requireRole([UserRole.SuperAdmin, UserRole.Admin], 'Only admin and super admin can access all logs'),
    logs.list.bind(logs)
  );

  return router;
};
