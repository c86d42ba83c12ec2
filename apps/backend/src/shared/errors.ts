export const ERROR_CODES = {
  INVALID_INPUT: 'INVALID_INPUT',
  GROUP_NOT_FOUND: 'GROUP_NOT_FOUND',
  USER_NOT_FOUND: 'USER_NOT_FOUND',
  POLICY_INVALID: 'POLICY_INVALID',
  TRANSPORT_FAILED: 'TRANSPORT_FAILED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  INVALID_INPUT: 'Invalid input',
  GROUP_NOT_FOUND: 'Permission group not found',
  USER_NOT_FOUND: 'User not found',
  POLICY_INVALID: 'Moderation policy is invalid',
  TRANSPORT_FAILED: 'Chat transport failed',
};

export class AppError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly details?: unknown;

  constructor(params: { errorCode: ErrorCode; message?: string; details?: unknown }) {
    super(params.message || ERROR_MESSAGES[params.errorCode]);
    this.name = 'AppError';
    this.errorCode = params.errorCode;
    this.details = params.details;
  }
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.errorCode === code);
}
