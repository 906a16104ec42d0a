import { Router } from 'express';
import { InvoiceController } from '../../controllers/financial/invoice.controller';
import { PaymentController } from '../../controllers/financial/payment.controller';
import { authenticateToken, requireRole } from '../../middleware/auth/jwt.middleware';
import { UploadMiddleware } from '../../middleware/upload.middleware';
import { UserRole } from '../../models/auth/user.model';

const ACCOUNTS = [UserRole.SuperAdmin, UserRole.Admin, UserRole.Accountant];

export interface InvoiceRouteControllers {
  invoices: InvoiceController;
  payments: PaymentController;
}

export const createInvoiceRouter = (controllers: InvoiceRouteControllers, upload: UploadMiddleware): Router => {
  const router = Router();
  const { invoices, payments } = controllers;

  router.use(authenticateToken);

  /**
   * @openapi
   * /invoices:
   *   post:
   *     tags:
   *       - Invoices
   *     summary: Upload an invoice
   *     description: multipart/form-data with a `request` JSON field and an optional `invoice_file`.
   *     security:
   *       - bearerAuth: []
   */
  router.post('/', upload.invoiceFile, invoices.create.bind(invoices));
  router.get('/', invoices.list.bind(invoices));
  router.get('/:invoiceId', invoices.getById.bind(invoices));
  router.put('/:invoiceId', requireRole(ACCOUNTS, 'Not authorized to update invoice'), invoices.update.bind(invoices));
  router.put(
    '/:invoiceId/status',
    requireRole(ACCOUNTS, 'Not authorized to update invoice status'),
    invoices.updateStatus.bind(invoices)
  );
  router.delete('/:invoiceId', requireRole(ACCOUNTS, 'Not authorized to delete invoice'), invoices.delete.bind(invoices));

  /**
   * @openapi
   * /invoices/{invoiceId}/payments:
   *   post:
   *     tags:
   *       - Invoice Payments
   *     summary: Record a payment against an invoice
   *     description: Rejected with 400 when it would take the paid total above the invoice amount.
   *     security:
   *       - bearerAuth: []
   */
  router.post(
    '/:invoiceId/payments',
    requireRole(ACCOUNTS, 'Not authorized to create invoice payments'),
    payments.record.bind(payments)
  );
  router.get('/:invoiceId/payments', payments.list.bind(payments));

  return router;
};
