/**
 * Credential Resolver
 *
 * Turns the raw X-AnyLLM-Key header into a Principal. Order:
 *   1. master key (constant-time compare)
 *   2. registered providers in order (access token, then API key)
 *
 * A provider that recognizes the token and rejects it ends resolution. When
 * every provider passes, the failure is ExpiredCredential if one of them saw
 * an expired token of its own kind, otherwise InvalidCredential.
 */

import { createHash, timingSafeEqual } from 'crypto';
import {
  ExpiredCredentialError,
  InvalidCredentialError,
  MalformedCredentialError,
  logger,
  type AuthenticationProvider,
  type Principal,
} from '@tollgate/core';

export const CREDENTIAL_HEADER = 'x-anyllm-key';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Extract the token from a "Bearer <token>" header value
 *
 * @throws MalformedCredentialError if the header is missing, repeated or not a bearer credential
 */
export function parseBearerCredential(header: string | string[] | undefined): string {
  if (typeof header !== 'string') {
    throw new MalformedCredentialError();
  }

  const match = BEARER_PATTERN.exec(header.trim());
  if (!match?.[1]) {
    throw new MalformedCredentialError();
  }
  return match[1];
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export class CredentialResolver {
  private readonly masterDigest: Buffer;

  constructor(
    masterKey: string,
    private providers: AuthenticationProvider[]
  ) {
    this.masterDigest = digest(masterKey);
  }

  /**
   * Resolve a header value to a principal
   *
   * @throws MalformedCredentialError, InvalidCredentialError, ExpiredCredentialError,
   *         RevokedOrUnknownSessionError
   */
  async resolve(header: string | string[] | undefined): Promise<Principal> {
    const token = parseBearerCredential(header);

    // Equal-length digests, so the comparison time does not depend on the input
    if (timingSafeEqual(digest(token), this.masterDigest)) {
      return { kind: 'master', is_admin: true };
    }

    let sawExpired = false;
    for (const provider of this.providers) {
      const result = await provider.authenticate(token);

      switch (result.outcome) {
        case 'authenticated':
          return result.principal;
        case 'rejected':
          logger.debug(
            { provider: provider.id, code: result.error.code },
            '[auth] Credential rejected'
          );
          throw result.error;
        case 'not_applicable':
          sawExpired = sawExpired || result.expired === true;
          break;
      }
    }

    if (sawExpired) {
      throw new ExpiredCredentialError();
    }
    throw new InvalidCredentialError();
  }
}
