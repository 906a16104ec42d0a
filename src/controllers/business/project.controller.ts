import { Request, Response } from 'express';
import { UploadConfig } from '../../config';
import { getAuthenticatedUser } from '../../middleware/auth/jwt.middleware';
import { getIndexedDocuments } from '../../middleware/upload.middleware';
import {
  balanceAdjustmentSchema,
  createProjectSchema,
  projectListQuerySchema,
  projectParamsSchema,
  updateProjectSchema,
} from '../../schemas/business/project.schema';
import { validateSchema } from '../../schemas/common.schema';
import { ProjectService } from '../../services/business/project.service';
import { parseJsonField } from '../../utils/multipart';
import { sendError, sendResponse } from '../../utils/response';

export class ProjectController {
  constructor(
    private readonly projectService: ProjectService,
    private readonly uploads: UploadConfig
  ) {}

  /**
   * POST /projects/create
   * Multipart: `request` (JSON) plus `po_document_<i>` files bound to POs by index.
   */
  async create(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const request = validateSchema(createProjectSchema, parseJsonField(req.body, 'request', 'request data'));
      const documents = getIndexedDocuments(req, this.uploads.maxPoDocuments);

      const result = await this.projectService.create(request, documents, user.id);
      sendResponse(
        res,
        201,
        `Project Created Successfully with ${result.po_summary.total_pos} PO(s) and ${result.po_summary.files_uploaded} document(s)`,
        { ...result.project, po_summary: result.po_summary, pos: result.pos }
      );
    } catch (error) {
      sendError(res, error, 'creating project');
    }
  }

  async list(req: Request, res: Response): Promise<void> {
    try {
      const filters = validateSchema(projectListQuerySchema, req.query);
      const projects = await this.projectService.findAll(filters);
      sendResponse(res, 200, 'Projects fetched successfully', projects);
    } catch (error) {
      sendError(res, error, 'fetching projects');
    }
  }

  async getById(req: Request, res: Response): Promise<void> {
    try {
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const project = await this.projectService.findById(projectId);
      sendResponse(res, 200, 'Project fetched successfully', project);
    } catch (error) {
      sendError(res, error, 'fetching project');
    }
  }

  async update(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const changes = validateSchema(updateProjectSchema, req.body);
      const project = await this.projectService.update(projectId, changes, user.id);
      sendResponse(res, 200, 'Project updated successfully', project);
    } catch (error) {
      sendError(res, error, 'updating project');
    }
  }

  async delete(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const result = await this.projectService.delete(projectId, user.id);
      sendResponse(res, 200, 'Project deleted successfully', result);
    } catch (error) {
      sendError(res, error, 'deleting project');
    }
  }

  async adjustBalance(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const request = validateSchema(balanceAdjustmentSchema, req.body);
      const result = await this.projectService.adjustBalance(projectId, request, user.id);
      sendResponse(res, 201, 'Project balance updated successfully', result);
    } catch (error) {
      sendError(res, error, 'updating project balance');
    }
  }

  async listBalances(req: Request, res: Response): Promise<void> {
    try {
      const { projectId } = validateSchema(projectParamsSchema, req.params);
      const balances = await this.projectService.listBalances(projectId);
      sendResponse(res, 200, 'Project balances fetched successfully', balances);
    } catch (error) {
      sendError(res, error, 'fetching project balances');
    }
  }
}
