/**
 * src/utils/dateFormatter.ts
 * Provides utilities for formatting dates in a human-readable format
 * using the configured timezone and format patterns.
 */
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import advancedFormat from 'dayjs/plugin/advancedFormat';
import dotenv from 'dotenv';

dotenv.config();

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(advancedFormat);

const DEFAULT_TIMEZONE = process.env.TIMEZONE || 'UTC';
const DEFAULT_DATE_FORMAT = process.env.DATE_FORMAT || 'MMM DD, YYYY hh:mm:ss A z'; // May 04, 2025 01:56:21 PM UTC
/** Used where a value is handed back to clients, e.g. the retryAfter of a 429 body. */
const DEFAULT_WIRE_FORMAT = process.env.WIRE_DATE_FORMAT || 'YYYY-MM-DD HH:mm:ss';

dayjs.tz.setDefault(DEFAULT_TIMEZONE);

/**
 * Formats a date or timestamp into a human-readable string
 * using the configured format and timezone
 *
 * @param format - Optional format string override
 */
export function formatDate(date: Date | string | number, format?: string): string {
  return dayjs(date)
    .tz(DEFAULT_TIMEZONE)
    .format(format || DEFAULT_DATE_FORMAT);
}

/**
 * Formats an instant for response bodies (sortable, no zone suffix).
 */
export function formatWireDate(date: Date | number): string {
  return dayjs(date).tz(DEFAULT_TIMEZONE).format(DEFAULT_WIRE_FORMAT);
}
