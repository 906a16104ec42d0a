/**
 * Project and PO validation schemas.
 * Shape and type checks only; amount, file index and PO-number rules are enforced by the services
 * so that their messages name the offending PO.
 */

import * as Joi from 'joi';
import {
  AddPORequest,
  BALANCE_TYPES,
  BalanceAdjustmentRequest,
  CreateProjectRequest,
  PODescriptor,
  UpdatePORequest,
  UpdateProjectRequest,
} from '../../models/business/project.model';
import { calendarDateSchema, currencyAmountSchema, optionalTextSchema, uuidSchema } from '../common.schema';

const poNumberSchema = Joi.string().trim().max(100).empty('').allow(null);

export const poDescriptorSchema = Joi.object<PODescriptor>({
  po_number: poNumberSchema,
  amount: currencyAmountSchema.required(),
  description: optionalTextSchema(1000),
  file_index: Joi.number().integer().allow(null),
});

// Parsed from the multipart `request` field of POST /projects/create
export const createProjectSchema = Joi.object<CreateProjectRequest>({
  name: Joi.string().trim().min(1).max(255).required(),
  description: optionalTextSchema(2000),
  location: optionalTextSchema(255),
  start_date: calendarDateSchema.allow(null),
  end_date: calendarDateSchema.allow(null),
  po_balance: currencyAmountSchema.default(0),
  estimated_balance: currencyAmountSchema.default(0),
  actual_balance: currencyAmountSchema.default(0),
  pos: Joi.array().items(poDescriptorSchema).default([]),
});

export const updateProjectSchema = Joi.object<UpdateProjectRequest>({
  name: Joi.string().trim().min(1).max(255),
  description: optionalTextSchema(2000),
  location: optionalTextSchema(255),
  start_date: calendarDateSchema.allow(null),
  end_date: calendarDateSchema.allow(null),
  po_balance: currencyAmountSchema,
  estimated_balance: currencyAmountSchema,
  actual_balance: currencyAmountSchema,
}).min(1);

export const balanceAdjustmentSchema = Joi.object<BalanceAdjustmentRequest>({
  adjustment: currencyAmountSchema.required(),
  balance_type: Joi.string().valid(...BALANCE_TYPES).required(),
  description: optionalTextSchema(500),
});

// Parsed from the multipart `po_data` field of POST /projects/:projectId/pos
export const addPOSchema = Joi.object<AddPORequest>({
  po_number: poNumberSchema,
  amount: currencyAmountSchema.required(),
  description: optionalTextSchema(1000),
});

export const updatePOSchema = Joi.object<UpdatePORequest>({
  po_number: poNumberSchema,
  amount: currencyAmountSchema,
  description: optionalTextSchema(1000),
}).min(1);

export const projectListQuerySchema = Joi.object<{ search?: string }>({
  search: Joi.string().trim().max(255).empty(''),
});

export const projectParamsSchema = Joi.object<{ projectId: string }>({
  projectId: uuidSchema.required(),
});

export const projectPOParamsSchema = Joi.object<{ projectId: string; poId: string }>({
  projectId: uuidSchema.required(),
  poId: uuidSchema.required(),
});
