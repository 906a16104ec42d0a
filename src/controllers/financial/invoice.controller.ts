import { Request, Response } from 'express';
import { getAuthenticatedUser } from '../../middleware/auth/jwt.middleware';
import { getSingleDocument } from '../../middleware/upload.middleware';
import { validateSchema } from '../../schemas/common.schema';
import {
  createInvoiceSchema,
  invoiceListQuerySchema,
  invoiceParamsSchema,
  invoiceStatusSchema,
  updateInvoiceSchema,
} from '../../schemas/financial/invoice.schema';
import { InvoiceService } from '../../services/financial/invoice.service';
import { parseJsonField } from '../../utils/multipart';
import { sendError, sendResponse } from '../../utils/response';

export class InvoiceController {
  constructor(private readonly invoiceService: InvoiceService) {}

  /**
   * POST /invoices
   * Multipart: `request` (JSON) and an optional `invoice_file`.
   */
  async create(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const request = validateSchema(createInvoiceSchema, parseJsonField(req.body, 'request', 'request data'));
      const invoice = await this.invoiceService.create(request, getSingleDocument(req), user.id);
      sendResponse(res, 201, 'Invoice uploaded successfully', invoice);
    } catch (error) {
      sendError(res, error, 'uploading invoice');
    }
  }

  async list(req: Request, res: Response): Promise<void> {
    try {
      const filters = validateSchema(invoiceListQuerySchema, req.query);
      const invoices = await this.invoiceService.findAll(filters);
      sendResponse(res, 200, 'Invoices fetched successfully', invoices);
    } catch (error) {
      sendError(res, error, 'fetching invoices');
    }
  }

  async getById(req: Request, res: Response): Promise<void> {
    try {
      const { invoiceId } = validateSchema(invoiceParamsSchema, req.params);
      const invoice = await this.invoiceService.findById(invoiceId);
      sendResponse(res, 200, 'Invoice fetched successfully', invoice);
    } catch (error) {
      sendError(res, error, 'fetching invoice');
    }
  }

  async update(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { invoiceId } = validateSchema(invoiceParamsSchema, req.params);
      const changes = validateSchema(updateInvoiceSchema, req.body);
      const invoice = await this.invoiceService.update(invoiceId, changes, user.id);
      sendResponse(res, 200, 'Invoice updated successfully', invoice);
    } catch (error) {
      sendError(res, error, 'updating invoice');
    }
  }

  async updateStatus(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { invoiceId } = validateSchema(invoiceParamsSchema, req.params);
      const { status } = validateSchema(invoiceStatusSchema, req.body);
      const result = await this.invoiceService.updateStatus(invoiceId, status, user.id);
      sendResponse(res, 200, 'Invoice status updated successfully', result);
    } catch (error) {
      sendError(res, error, 'updating invoice status');
    }
  }

  async delete(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { invoiceId } = validateSchema(invoiceParamsSchema, req.params);
      const result = await this.invoiceService.delete(invoiceId, user.id);
      sendResponse(res, 200, 'Invoice deleted successfully', result);
    } catch (error) {
      sendError(res, error, 'deleting invoice');
    }
  }
}
