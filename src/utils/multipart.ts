import { ValidationError, errorMessage } from './errors';

/**
 * Reads a JSON document sent as a multipart text field.
 * A body that is already an object (a plain JSON request) is returned as is.
 *
 * @param label - Wording used in the error, e.g. `request data`
 */
export const parseJsonField = (body: unknown, field: string, label: string): unknown => {
  if (typeof body !== 'object' || body === null) {
    throw new ValidationError(`Missing '${field}' field`);
  }

  const raw: unknown = Reflect.get(body, field);
  if (raw === undefined) {
    throw new ValidationError(`Missing '${field}' field`);
  }
  if (typeof raw !== 'string') {
    return raw;
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${label}: ${errorMessage(error)}`);
  }
};

/**
 * Like parseJsonField, but falls back to the whole body when the field is absent.
 */
export const parseJsonFieldOrBody = (body: unknown, field: string, label: string): unknown => {
  if (typeof body === 'object' && body !== null && Reflect.get(body, field) !== undefined) {
    return parseJsonField(body, field, label);
  }
  return body;
};
