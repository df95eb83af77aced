export const MINOR_REVIEW = {
  MIN_SUSPECTED_AGE: 1,
  MAX_SUSPECTED_AGE: 17,
  ADULT_AGE: 18,
  /** Fixed-length year; leap days are ignored. */
  DAYS_PER_YEAR: 365,
  REVIEWER_CACHE_TTL_MS: 60_000,
} as const;

export const CONSENT_CHECK = {
  TIMEOUT_MS: 10_000,
  SIGNATURE_HEADER: 'X-Signature',
  SIGNATURE_ALGORITHM: 'sha1',
} as const;

export const SCHEDULER = {
  INTERVAL_MS: 60_000,
  /** Bans and mutes due within this window are picked up by the current cycle. */
  LOOKAHEAD_MS: 60_000,
} as const;

export const REPORT_COLORS = {
  pending: 0xffa500,
  approved: 0xff2429,
  denied: 0x00ff00,
  consent_verified: 0x0099ff,
} as const;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Disclosure sent with a ban issued from an approved minor report. */
export const PARENTAL_CONSENT_BAN_REASON =
  'Parental consent is missing. Please have a parent or guardian submit the parental consent form, '
  + 'then contact the moderation team to restore access.';
