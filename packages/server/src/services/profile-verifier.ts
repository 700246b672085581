/**
 * HTTP Profile Verifier
 *
 * Default ProfileVerifier: presents the social provider's access token to
 * that provider's userinfo endpoint and normalizes the reply.
 *
 * Field mapping: sub | id → subject, email, name, picture | avatar_url.
 */

import { z } from 'zod';
import {
  ProfileVerificationFailedError,
  logger,
  type ProfileVerificationConfig,
  type ProfileVerificationRequest,
  type ProfileVerifier,
  type VerifiedProfile,
} from '@tollgate/core';

const userinfoSchema = z.object({
  sub: z.union([z.string(), z.number()]).optional(),
  id: z.union([z.string(), z.number()]).optional(),
  email: z.string().nullish(),
  name: z.string().nullish(),
  picture: z.string().nullish(),
  avatar_url: z.string().nullish(),
});

export type FetchFn = typeof fetch;

export class HttpProfileVerifier implements ProfileVerifier {
  constructor(
    private config: ProfileVerificationConfig,
    private fetchFn: FetchFn = fetch
  ) {}

  async verify(request: ProfileVerificationRequest, signal: AbortSignal): Promise<VerifiedProfile> {
    const endpoint = this.config.providers[request.provider];
    if (!endpoint) {
      throw new ProfileVerificationFailedError(`Unsupported provider '${request.provider}'`, {
        provider: request.provider,
      });
    }

    let response: Response;
    try {
      response = await this.fetchFn(endpoint.userinfo_url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${request.access_token}`,
          Accept: 'application/json',
        },
        signal,
      });
    } catch (err) {
      if (signal.aborted) {
        throw err;
      }
      logger.warn({ err, provider: request.provider }, '[provisioning] Profile provider unreachable');
      throw new ProfileVerificationFailedError('Profile provider unreachable', {
        provider: request.provider,
      });
    }

    if (!response.ok) {
      throw new ProfileVerificationFailedError('Profile provider rejected the access token', {
        provider: request.provider,
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      logger.warn({ err, provider: request.provider }, '[provisioning] Profile response is not JSON');
      throw new ProfileVerificationFailedError('Profile response is not JSON', {
        provider: request.provider,
      });
    }

    const parsed = userinfoSchema.safeParse(body);
    const subject = parsed.success ? (parsed.data.sub ?? parsed.data.id) : undefined;
    if (!parsed.success || subject === undefined || subject === '') {
      throw new ProfileVerificationFailedError('Profile response has no subject', {
        provider: request.provider,
      });
    }

    const profile = parsed.data;
    return {
      subject: String(subject),
      email: profile.email ?? null,
      name: profile.name ?? null,
      avatar_url: profile.picture ?? profile.avatar_url ?? null,
      role: 'user',
    };
  }
}
