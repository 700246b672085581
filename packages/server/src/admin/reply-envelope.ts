/**
 * API Response Envelope Helpers
 *
 * Every response body follows one of two shapes:
 * - Success: { ok: true, data: T }
 * - Error: { ok: false, error: { code, message, details? } }
 *
 * @see packages/contracts/src/envelope.ts for TypeScript types
 */

import type { ErrorEnvelope, SuccessEnvelope } from '@tollgate/contracts';
import { ErrorCodes } from '@tollgate/contracts';

export { ErrorCodes };

/**
 * Wrap data in a success envelope
 *
 * @example
 * return reply.send(wrapSuccess({ user_id: 'u-1' }));
 */
export function wrapSuccess<T>(data: T): SuccessEnvelope<T> {
  return { ok: true, data };
}

/**
 * Wrap error in an error envelope
 *
 * @param code Error code from ErrorCodes
 * @param message Human-readable error message
 * @param details Optional additional error details
 *
 * @example
 * return reply.status(404).send(wrapError(ErrorCodes.NOT_FOUND, 'User not found'));
 */
export function wrapError(code: string, message: string, details?: unknown[]): ErrorEnvelope {
  return {
    ok: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}
