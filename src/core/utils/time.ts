/**
 * Time helpers shared by the API types and the issuance client
 */

import { ConfigurationError, TimestampParseError } from '../errors.js';

/**
 * Layout of timestamps returned by the issuance service
 */
export const ISSUANCE_TIMESTAMP_LAYOUT = 'YYYY-MM-DDTHH:MM:SS';

const ISSUANCE_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parse a `YYYY-MM-DDTHH:MM:SS` timestamp as UTC.
 *
 * Anything else (a zone suffix, fractional seconds, out of range fields such
 * as `2024-02-30`) fails with a TimestampParseError.
 */
export function parseIssuanceTimestamp(value: string): Date {
  const match = ISSUANCE_TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new TimestampParseError(
      `cannot parse "${value}" as ${ISSUANCE_TIMESTAMP_LAYOUT}`,
      value
    );
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    throw new TimestampParseError(`cannot parse "${value}" as ${ISSUANCE_TIMESTAMP_LAYOUT}`, value);
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls over out-of-range fields; a round trip catches them
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new TimestampParseError(`parsing "${value}": field value out of range`, value);
  }

  return date;
}

/**
 * Serialize a Date the way Kubernetes serializes metav1.Time (second precision, UTC)
 */
export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parse an RFC 3339 timestamp read from a resource status; undefined when
 * absent or unparseable.
 */
export function parseRfc3339(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }

  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?(?:ms|s|m|h))+$/;
const DURATION_PART = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/**
 * Parse a Kubernetes-style duration (`30s`, `1m30s`, `1.5h`, `500ms`) into
 * milliseconds.
 */
export function parseDuration(value: string): number {
  if (!DURATION_PATTERN.test(value)) {
    throw new ConfigurationError(`invalid duration "${value}"`, { value });
  }

  let total = 0;
  for (const [, amount, unit] of value.matchAll(DURATION_PART)) {
    const multiplier = unit === undefined ? undefined : DURATION_UNITS_MS[unit];
    if (amount === undefined || multiplier === undefined) {
      throw new ConfigurationError(`invalid duration "${value}"`, { value });
    }
    total += Number(amount) * multiplier;
  }

  return Math.round(total);
}
