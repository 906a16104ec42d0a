import { Request, Response } from 'express';
import { getAuthenticatedUser } from '../../middleware/auth/jwt.middleware';
import { getSingleDocument } from '../../middleware/upload.middleware';
import { addPOSchema, projectParamsSchema, projectPOParamsSchema, updatePOSchema } from '../../schemas/business/project.schema';
import { validateSchema } from '../../schemas/common.schema';
import { ProjectPOService } from '../../services/business/project-po.service';
import { parseJsonField, parseJsonFieldOrBody } from '../../utils/multipart';
import { sendError, sendResponse } from '../../utils/response';

export class ProjectPOController {
  constructor(private readonly poService: ProjectPOService) {}

  /**
   * POST /projects/:projectId/pos
   * Multipart: `po_data` (JSON) and an optional `po_document`.
   */
  async add(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const request = validateSchema(addPOSchema, parseJsonField(req.body, 'po_data', 'PO data'));
      const po = await this.poService.add(projectId, request, getSingleDocument(req), user.id);
      sendResponse(res, 201, 'PO added to project successfully', po);
    } catch (error) {
      sendError(res, error, 'adding PO');
    }
  }

  async list(req: Request, res: Response): Promise<void> {
    try {
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const result = await this.poService.list(projectId);
      sendResponse(res, 200, 'Project POs fetched successfully', result);
    } catch (error) {
      sendError(res, error, 'fetching project POs');
    }
  }

  /**
   * PUT /projects/:projectId/pos/:poId
   * Accepts a JSON body or a multipart `po_data` field.
   */
  async update(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { projectId, poId } = validateSchema(projectPOParamsSchema, req.params);
      const changes = validateSchema(updatePOSchema, parseJsonFieldOrBody(req.body, 'po_data', 'PO data'));
      const po = await this.poService.update(projectId, poId, changes, user.id);
      sendResponse(res, 200, 'PO updated successfully', po);
    } catch (error) {
      sendError(res, error, 'updating PO');
    }
  }

  async delete(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { projectId, poId } = validateSchema(projectPOParamsSchema, req.params);
      const result = await this.poService.delete(projectId, poId, user.id);
      sendResponse(res, 200, 'PO deleted successfully', result);
    } catch (error) {
      sendError(res, error, 'deleting PO');
    }
  }
}
