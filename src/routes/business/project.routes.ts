import { Router } from 'express';
import { AnalyticsController } from '../../controllers/analytics/analytics.controller';
import { ProjectPOController } from '../../controllers/business/project-po.controller';
import { ProjectController } from '../../controllers/business/project.controller';
import { authenticateToken, requireRole } from '../../middleware/auth/jwt.middleware';
import { UploadMiddleware } from '../../middleware/upload.middleware';
import { UserRole } from '../../models/auth/user.model';

const PROJECT_MANAGERS = [UserRole.SuperAdmin, UserRole.Admin, UserRole.ProjectManager];
const ANALYTICS_VIEWERS = [UserRole.SuperAdmin, UserRole.Admin, UserRole.Accountant, UserRole.ProjectManager];

export interface ProjectRouteControllers {
  projects: ProjectController;
  pos: ProjectPOController;
  analytics: AnalyticsController;
}

export const createProjectRouter = (controllers: ProjectRouteControllers, upload: UploadMiddleware): Router => {
  const router = Router();
  const { projects, pos, analytics } = controllers;

  router.use(authenticateToken);

  /**
   * @openapi
   * /projects/create:
   *   post:
   *     tags:
   *       - Projects
   *     summary: Create a project with its POs and PO documents
   *     description: >
   *       multipart/form-data with a `request` JSON field and up to MAX_PO_DOCUMENTS files
   *       named `po_document_0`, `po_document_1`, ... Each PO binds to the file at its
   *       `file_index`, or at its own position when no index is given.
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       201:
   *         description: Project created
   *       400:
   *         description: Invalid PO, file index or document; nothing is persisted
   *       403:
   *         description: Role not allowed to create projects
   */
  router.post(
    '/create',
    requireRole(PROJECT_MANAGERS, 'Not authorized to create projects'),
    upload.projectCreation,
    projects.create.bind(projects)
  );
  router.get('/', projects.list.bind(projects));
  router.get('/:projectId', projects.getById.bind(projects));
  router.put('/:projectId', requireRole(PROJECT_MANAGERS, 'Not authorized to update projects'), projects.update.bind(projects));
  router.delete(
    '/:projectId',
    requireRole([UserRole.SuperAdmin, UserRole.Admin], 'Not authorized to delete projects'),
    projects.delete.bind(projects)
  );

  router.post(
    '/:projectId/balances',
    requireRole(PROJECT_MANAGERS, 'Not authorized to adjust project balances'),
    projects.adjustBalance.bind(projects)
  );
  router.get('/:projectId/balances', projects.listBalances.bind(projects));

  router.post(
    '/:projectId/pos',
    requireRole(PROJECT_MANAGERS, 'Unauthorized to add POs to project'),
    upload.poDocument,
    pos.add.bind(pos)
  );
  router.get('/:projectId/pos', pos.list.bind(pos));
  router.put(
    '/:projectId/pos/:poId',
    requireRole(PROJECT_MANAGERS, 'Unauthorized to update POs'),
    upload.none,
    pos.update.bind(pos)
  );
  router.delete('/:projectId/pos/:poId', requireRole(PROJECT_MANAGERS, 'Unauthorized to delete POs'), pos.delete.bind(pos));

  /**
   * @openapi
   * /projects/{projectId}/invoice-analytics:
   *   get:
   *     tags:
   *       - Analytics
   *     summary: Per-invoice payment lateness for a project
   *     security:
   *       - bearerAuth: []
   */
  router.get(
    '/:projectId/invoice-analytics',
    requireRole(ANALYTICS_VIEWERS, 'Not authorized to view invoice analytics'),
    analytics.getInvoiceAnalytics.bind(analytics)
  );

  return router;
};
