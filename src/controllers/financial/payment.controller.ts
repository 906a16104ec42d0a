import { Request, Response } from 'express';
import { getAuthenticatedUser } from '../../middleware/auth/jwt.middleware';
import { validateSchema } from '../../schemas/common.schema';
import { invoiceParamsSchema, recordPaymentSchema } from '../../schemas/financial/invoice.schema';
import { PaymentService } from '../../services/financial/payment.service';
import { sendError, sendResponse } from '../../utils/response';

export class PaymentController {
  constructor(private readonly paymentService: PaymentService) {}

  // POST /invoices/:invoiceId/payments
  async record(req: Request, res: Response): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { invoiceId } = validateSchema(invoiceParamsSchema, req.params);
      const request = validateSchema(recordPaymentSchema, req.body);
      const payment = await this.paymentService.recordPayment(invoiceId, request, user.id);
      sendResponse(res, 201, 'Invoice payment created successfully', payment);
    } catch (error) {
      sendError(res, error, 'creating invoice payment');
    }
  }

  // GET /invoices/:invoiceId/payments
  async list(req: Request, res: Response): Promise<void> {
    try {
      const { invoiceId } = validateSchema(invoiceParamsSchema, req.params);
      const history = await this.paymentService.listPayments(invoiceId);
      sendResponse(res, 200, 'Invoice payments fetched successfully', history);
    } catch (error) {
      sendError(res, error, 'fetching invoice payments');
    }
  }
}
