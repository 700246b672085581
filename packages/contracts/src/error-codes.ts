export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  BAD_REQUEST: 'BAD_REQUEST',

  // Credential resolution
  MALFORMED_CREDENTIAL: 'MALFORMED_CREDENTIAL',
  INVALID_CREDENTIAL: 'INVALID_CREDENTIAL',
  EXPIRED_CREDENTIAL: 'EXPIRED_CREDENTIAL',
  REVOKED_OR_UNKNOWN_SESSION: 'REVOKED_OR_UNKNOWN_SESSION',

  // Social login / provisioning
  PROFILE_VERIFICATION_FAILED: 'PROFILE_VERIFICATION_FAILED',
  PROVISIONING_CONFLICT: 'PROVISIONING_CONFLICT',
  PROVISIONING_FAILED: 'PROVISIONING_FAILED',

  // Refresh token lifecycle
  INVALID_REFRESH_TOKEN: 'INVALID_REFRESH_TOKEN',
  REFRESH_EXPIRED: 'REFRESH_EXPIRED',
  REFRESH_REUSE_DETECTED: 'REFRESH_REUSE_DETECTED',

  // Authorization and accounting
  TARGET_USER_REQUIRED: 'TARGET_USER_REQUIRED',
  USER_BLOCKED: 'USER_BLOCKED',
  BUDGET_EXCEEDED: 'BUDGET_EXCEEDED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
