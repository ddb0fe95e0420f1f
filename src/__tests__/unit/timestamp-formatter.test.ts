/**
 * Unit tests for Slack timestamp formatting.
 */

import { describe, it, expect } from 'vitest';
import {
  createTimestampFormatter,
  parseSlackTimestamp,
  isValidTimeZone,
} from '../../timestamp-formatter.js';
import { ErrorCode, ThreadBotError } from '../../errors.js';

// 1700000000 = 2023-11-14T22:13:20Z
const TS = '1700000000.123456';

describe('createTimestampFormatter', () => {
  it('renders a 12-hour clock with PM in UTC', () => {
    expect(createTimestampFormatter('UTC')(TS)).toBe('10:13 PM');
  });

  it('uses the configured zone', () => {
    expect(createTimestampFormatter('America/New_York')(TS)).toBe('05:13 PM');
    expect(createTimestampFormatter('Asia/Tokyo')(TS)).toBe('07:13 AM');
  });

  it('shows midnight as 12 AM', () => {
    // 1699920000 = 2023-11-14T00:00:00Z
    expect(createTimestampFormatter('UTC')('1699920000.000000')).toBe('12:00 AM');
  });

  it('accepts a ts without a fractional part', () => {
    expect(createTimestampFormatter('UTC')('1700000000')).toBe('10:13 PM');
  });

  it('shows the same time for timestamps within one minute', () => {
    const format = createTimestampFormatter('UTC');
    // 22:13:00 and 22:13:59
    expect(format('1699999980.000001')).toBe(format('1700000039.999999'));
  });

  it('throws INVALID_TIMESTAMP on malformed input', () => {
    const format = createTimestampFormatter('UTC');
    for (const bad of ['', 'abc', '1700000000.12.3', '-5', ' 1700000000']) {
      expect(() => format(bad)).toThrow(ThreadBotError);
    }
    try {
      format('not-a-ts');
    } catch (error) {
      expect((error as ThreadBotError).code).toBe(ErrorCode.INVALID_TIMESTAMP);
    }
  });

  it('rejects an unknown time zone up front', () => {
    expect(() => createTimestampFormatter('Mars/Olympus_Mons')).toThrow('unknown time zone "Mars/Olympus_Mons"');
  });
});

describe('parseSlackTimestamp', () => {
  it('returns epoch milliseconds', () => {
    expect(parseSlackTimestamp('1700000000.5')).toBe(1700000000500);
  });

  it('rejects digit strings past the representable date range', () => {
    expect(() => parseSlackTimestamp('99999999999999999')).toThrow(
      '"99999999999999999" is not a Slack timestamp'
    );
  });

  it('throws INVALID_TIMESTAMP from the formatter for out-of-range input', () => {
    let caught: unknown;
    try {
      createTimestampFormatter('UTC')('99999999999999999');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ThreadBotError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_TIMESTAMP });
  });
});

describe('isValidTimeZone', () => {
  it('accepts IANA zones and rejects garbage', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Not/AZone')).toBe(false);
  });
});
