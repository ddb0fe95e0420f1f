/**
 * Slack timestamp → display time (`09:05 PM`) in a fixed time zone.
 */

import { Errors } from './errors.js';

const SLACK_TS_PATTERN = /^\d+(\.\d+)?$/;

export type TimestampFormatter = (ts: string) => string;

/**
 * Parse a Slack `ts` ("1700000000.123456") into epoch milliseconds.
 * Throws INVALID_TIMESTAMP on anything else.
 */
export function parseSlackTimestamp(ts: string): number {
  if (!SLACK_TS_PATTERN.test(ts)) {
    throw Errors.invalidTimestamp(ts);
  }
  const millis = Number(ts) * 1000;
  // Digits alone can still fall outside the Date range
  if (Number.isNaN(new Date(millis).getTime())) {
    throw Errors.invalidTimestamp(ts);
  }
  return millis;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * The zone the process would use when none is configured.
 */
export function localTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function createTimestampFormatter(timeZone: string): TimestampFormatter {
  if (!isValidTimeZone(timeZone)) {
    throw Errors.invalidConfig(`unknown time zone "${timeZone}"`);
  }

  const clock = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
  });

  return (ts: string): string => {
    const parts = clock.formatToParts(new Date(parseSlackTimestamp(ts)));
    // Assemble from parts: ICU versions differ on the space before AM/PM
    const part = (type: Intl.DateTimeFormatPartTypes) =>
      parts.find((p) => p.type === type)?.value ?? '';
    return `${part('hour').padStart(2, '0')}:${part('minute')} ${part('dayPeriod').toUpperCase()}`;
  };
}
