/**
 * Invoice and invoice-payment validation schemas.
 * Dates are accepted as strings here and parsed by the services, which report format errors
 * in their own words.
 */

import * as Joi from 'joi';
import {
  CreateInvoiceRequest,
  INVOICE_STATUSES,
  InvoiceFilters,
  InvoiceStatus,
  PAYMENT_STATUSES,
  RecordPaymentRequest,
  UpdateInvoiceRequest,
} from '../../models/financial/invoice.model';
import { currencyAmountSchema, optionalTextSchema, uuidSchema } from '../common.schema';

// Parsed from the multipart `request` field of POST /invoices
export const createInvoiceSchema = Joi.object<CreateInvoiceRequest>({
  project_id: uuidSchema.required(),
  project_po_id: uuidSchema.empty('').allow(null),
  client_name: Joi.string().trim().min(1).max(255).required(),
  invoice_item: Joi.string().trim().min(1).max(255).required(),
  amount: currencyAmountSchema.required(),
  description: optionalTextSchema(2000),
  due_date: Joi.string().trim().required(),
});

export const updateInvoiceSchema = Joi.object<UpdateInvoiceRequest>({
  client_name: Joi.string().trim().min(1).max(255),
  invoice_item: Joi.string().trim().min(1).max(255),
  amount: currencyAmountSchema,
  description: optionalTextSchema(2000),
  due_date: Joi.string().trim(),
}).min(1);

export const invoiceStatusSchema = Joi.object<{ status: InvoiceStatus }>({
  status: Joi.string().valid(...INVOICE_STATUSES).required(),
});

export const invoiceListQuerySchema = Joi.object<InvoiceFilters>({
  project_id: uuidSchema,
  status: Joi.string().valid(...INVOICE_STATUSES),
  payment_status: Joi.string().valid(...PAYMENT_STATUSES),
});

export const invoiceParamsSchema = Joi.object<{ invoiceId: string }>({
  invoiceId: uuidSchema.required(),
});

export const recordPaymentSchema = Joi.object<RecordPaymentRequest>({
  amount: currencyAmountSchema.required(),
  payment_date: Joi.string().trim().required(),
  description: optionalTextSchema(1000),
  payment_method: optionalTextSchema(50),
  reference_number: optionalTextSchema(100),
});
