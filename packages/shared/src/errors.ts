export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 400,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export const Errors = {
  // Validation
  INVALID_AGE: () => new AppError('INVALID_AGE', 'Suspected age must be between 1 and 17.', 400),
  EVIDENCE_REQUIRED: () => new AppError('EVIDENCE_REQUIRED', 'Evidence is required to flag a user.', 400),
  INVALID_DURATION: () => new AppError('INVALID_DURATION', 'Invalid duration. Use a value such as 3y, 30d or 12h.', 400),
  GUILD_ONLY: () => new AppError('GUILD_ONLY', 'This command can only be used in a server.', 400),

  // Authorization
  NOT_REVIEWER: () => new AppError('NOT_REVIEWER', 'You are not authorized to review minor reports.', 403),
  MISSING_ROLE: () => new AppError('MISSING_ROLE', 'You do not have permission to use this command.', 403),

  // Not found
  REPORT_NOT_FOUND: () => new AppError('REPORT_NOT_FOUND', 'Report not found or already resolved.', 404),
  ACCOUNT_NOT_LINKED: () => new AppError('ACCOUNT_NOT_LINKED', 'Could not find linked account for this user.', 404),

  // State
  REPORT_NOT_PENDING: () => new AppError('REPORT_NOT_PENDING', 'This report is no longer pending.', 409),
  REPORT_BUSY: () => new AppError('REPORT_BUSY', 'Another reviewer is already resolving this report.', 409),
} as const;
