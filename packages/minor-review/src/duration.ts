import { Errors, MINOR_REVIEW } from '@safeguard/shared';

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60,
  w: 7 * 24 * 60 * 60,
  y: MINOR_REVIEW.DAYS_PER_YEAR * 24 * 60 * 60,
};

const COMPOUND = /^(\d+[smhdwy])+$/;
const PART = /(\d+)([smhdwy])/g;

/**
 * Parse a moderator-entered duration ("3y", "1y6d", "90m" or bare seconds)
 * into seconds. Throws INVALID_DURATION for anything else, or for zero.
 */
export function parseDuration(input: string): number {
  const value = input.trim().toLowerCase().replace(/\s+/g, '');

  let seconds = 0;
  if (/^\d+$/.test(value)) {
    seconds = Number(value);
  } else if (COMPOUND.test(value)) {
    for (const [, amount, unit] of value.matchAll(PART)) {
      seconds += Number(amount) * UNIT_SECONDS[unit];
    }
  } else {
    throw Errors.INVALID_DURATION();
  }

  if (!Number.isSafeInteger(seconds) || seconds <= 0) {
    throw Errors.INVALID_DURATION();
  }
  return seconds;
}

export function formatYears(years: number): string {
  return `${years}y`;
}
