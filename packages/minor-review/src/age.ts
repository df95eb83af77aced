import { Errors, MINOR_REVIEW, MS_PER_DAY } from '@safeguard/shared';

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

export function isValidSuspectedAge(age: number): boolean {
  return Number.isInteger(age)
    && age >= MINOR_REVIEW.MIN_SUSPECTED_AGE
    && age <= MINOR_REVIEW.MAX_SUSPECTED_AGE;
}

/** Whole years until the user turns 18. Throws INVALID_AGE outside 1-17. */
export function yearsUntil18(age: number): number {
  if (!isValidSuspectedAge(age)) {
    throw Errors.INVALID_AGE();
  }
  return MINOR_REVIEW.ADULT_AGE - age;
}

/** Unix seconds at which a ban for a user of `age` should end. */
export function banEndEpoch(age: number, now: Date = new Date()): number {
  const years = yearsUntil18(age);
  const nowSeconds = Math.floor(now.getTime() / 1000);
  return nowSeconds + years * MINOR_REVIEW.DAYS_PER_YEAR * 24 * 60 * 60;
}

/**
 * Parse a stored timestamp as UTC. Strings without a zone designator
 * (e.g. "2024-01-02 03:04:05") are taken to be UTC, not local time.
 */
export function toUtcDate(value: Date | string): Date {
  if (value instanceof Date) return value;

  const trimmed = value.trim();
  if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
    return toUtcDate(`${trimmed}T00:00:00Z`);
  }
  const isoLike = trimmed.includes(' ') && !trimmed.includes('T')
    ? trimmed.replace(' ', 'T')
    : trimmed;
  const normalized = ZONE_SUFFIX.test(isoLike) ? isoLike : `${isoLike}Z`;

  const parsed = new Date(normalized);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return parsed;
}

/** Instant at which a report's protective role should be removed. */
export function expiryInstant(createdAt: Date | string, suspectedAge: number): Date {
  const years = yearsUntil18(suspectedAge);
  const start = toUtcDate(createdAt);
  return new Date(start.getTime() + years * MINOR_REVIEW.DAYS_PER_YEAR * MS_PER_DAY);
}

export function hasExpired(createdAt: Date | string, suspectedAge: number, now: Date = new Date()): boolean {
  return now.getTime() >= expiryInstant(createdAt, suspectedAge).getTime();
}
