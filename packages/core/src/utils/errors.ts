/**
 * Custom error classes
 *
 * All gateway errors extend GatewayError so the HTTP layer can map them to
 * the response envelope without inspecting messages.
 */

import { ErrorCodes, type ErrorCode } from '@tollgate/contracts';

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

// ===== Credential resolution =====

export class MalformedCredentialError extends GatewayError {
  constructor(message = 'Missing or malformed credential header') {
    super(message, ErrorCodes.MALFORMED_CREDENTIAL, 401);
    this.name = 'MalformedCredentialError';
  }
}

export class InvalidCredentialError extends GatewayError {
  constructor(message = 'Invalid credential') {
    super(message, ErrorCodes.INVALID_CREDENTIAL, 401);
    this.name = 'InvalidCredentialError';
  }
}

export class ExpiredCredentialError extends GatewayError {
  constructor(message = 'Credential expired') {
    super(message, ErrorCodes.EXPIRED_CREDENTIAL, 401);
    this.name = 'ExpiredCredentialError';
  }
}

export class RevokedOrUnknownSessionError extends GatewayError {
  constructor(message = 'Session revoked or unknown') {
    super(message, ErrorCodes.REVOKED_OR_UNKNOWN_SESSION, 401);
    this.name = 'RevokedOrUnknownSessionError';
  }
}

// ===== Social login / provisioning =====

export class ProfileVerificationFailedError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.PROFILE_VERIFICATION_FAILED, 401, details);
    this.name = 'ProfileVerificationFailedError';
  }
}

export class ProvisioningConflictError extends GatewayError {
  constructor(message = 'Identity was provisioned concurrently') {
    super(message, ErrorCodes.PROVISIONING_CONFLICT, 409);
    this.name = 'ProvisioningConflictError';
  }
}

export class ProvisioningFailedError extends GatewayError {
  constructor(message = 'Identity provisioning failed, retry the login') {
    super(message, ErrorCodes.PROVISIONING_FAILED, 503);
    this.name = 'ProvisioningFailedError';
  }
}

// ===== Refresh token lifecycle =====

export class InvalidRefreshTokenError extends GatewayError {
  constructor(message = 'Invalid refresh token') {
    super(message, ErrorCodes.INVALID_REFRESH_TOKEN, 401);
    this.name = 'InvalidRefreshTokenError';
  }
}

export class RefreshExpiredError extends GatewayError {
  constructor(message = 'Refresh token expired, login required') {
    super(message, ErrorCodes.REFRESH_EXPIRED, 401);
    this.name = 'RefreshExpiredError';
  }
}

export class RefreshReuseDetectedError extends GatewayError {
  constructor(message = 'Refresh token reuse detected, login required') {
    super(message, ErrorCodes.REFRESH_REUSE_DETECTED, 401);
    this.name = 'RefreshReuseDetectedError';
  }
}

// ===== Authorization =====

export class ForbiddenError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.FORBIDDEN, 403, details);
    this.name = 'ForbiddenError';
  }
}

export class TargetUserRequiredError extends GatewayError {
  constructor(message = "When using the master key, the 'user' parameter is required") {
    super(message, ErrorCodes.TARGET_USER_REQUIRED, 400);
    this.name = 'TargetUserRequiredError';
  }
}

// ===== Accounting =====

export class UserBlockedError extends GatewayError {
  constructor(userId: string) {
    super(`User '${userId}' is blocked`, ErrorCodes.USER_BLOCKED, 403);
    this.name = 'UserBlockedError';
  }
}

export class BudgetExceededError extends GatewayError {
  constructor(userId: string, details?: Record<string, unknown>) {
    super(`User '${userId}' has exhausted their budget`, ErrorCodes.BUDGET_EXCEEDED, 402, details);
    this.name = 'BudgetExceededError';
  }
}

// ===== Generic =====

export class ValidationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, ErrorCodes.NOT_FOUND, 404);
    this.name = 'NotFoundError';
  }
}
