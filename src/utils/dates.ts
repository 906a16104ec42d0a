import moment from 'moment-timezone';

export const DATE_FORMAT = 'YYYY-MM-DD';
const DATE_TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';

/**
 * Parses a calendar date (`YYYY-MM-DD`), returning it normalised or null if invalid.
 */
export const parseDate = (value: string): string | null => {
  const parsed = moment.utc(value, DATE_FORMAT, true);
  return parsed.isValid() ? parsed.format(DATE_FORMAT) : null;
};

/**
 * Parses a due date given as `YYYY-MM-DD` or `YYYY-MM-DD HH:mm:ss` and keeps only the date.
 */
export const parseDueDate = (value: string): string | null => {
  const parsed = moment.utc(value, [DATE_FORMAT, DATE_TIME_FORMAT], true);
  return parsed.isValid() ? parsed.format(DATE_FORMAT) : null;
};

/**
 * Today's calendar date in the given IANA time zone.
 */
export const todayIn = (timezone: string): string => moment.tz(timezone).format(DATE_FORMAT);
