import * as Joi from 'joi';
import { hasCentPrecision } from '../services/financial/payment-status';
import { parseDate } from '../utils/dates';
import { ValidationError } from '../utils/errors';

/**
 * Calendar date in strict `YYYY-MM-DD` form.
 */
export const calendarDateSchema = Joi.string()
  .custom((value: string, helpers) => parseDate(value) ?? helpers.error('string.calendarDate'))
  .messages({ 'string.calendarDate': '{{#label}} must be a valid date in YYYY-MM-DD format' });

/**
 * Monetary amount with at most two decimal places.
 */
export const currencyAmountSchema = Joi.number()
  .custom((value: number, helpers) => (hasCentPrecision(value) ? value : helpers.error('number.currency')))
  .messages({ 'number.currency': '{{#label}} must have at most 2 decimal places' });

export const uuidSchema = Joi.string().guid();

export const optionalTextSchema = (max: number) => Joi.string().max(max).allow(null, '');

/**
 * Validates `payload` against `schema`, returning the converted value with unknown keys removed.
 *
 * @throws {ValidationError} Listing every failed constraint
 */
export const validateSchema = <T>(schema: Joi.ObjectSchema<T>, payload: unknown): T => {
  const { error, value } = schema.validate(payload ?? {}, { abortEarly: false, stripUnknown: true, convert: true });
  if (error) {
    throw new ValidationError(`Validation failed: ${error.details.map((detail) => detail.message).join(', ')}`);
  }
  return value;
};
