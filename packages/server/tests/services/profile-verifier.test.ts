import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { ProfileVerificationFailedError, type ProfileVerificationConfig } from '@tollgate/core';
import { HttpProfileVerifier, type FetchFn } from '../../src/services/profile-verifier.js';

const CONFIG: ProfileVerificationConfig = {
  timeout_ms: 5000,
  providers: {
    google: { userinfo_url: 'https://accounts.example.com/userinfo' },
    github: { userinfo_url: 'https://code.example.com/user' },
  },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('HttpProfileVerifier', () => {
  let fetchFn: Mock<FetchFn>;
  let verifier: HttpProfileVerifier;

  beforeEach(() => {
    fetchFn = vi.fn<FetchFn>();
    verifier = new HttpProfileVerifier(CONFIG, fetchFn);
  });

  it('should present the token to the provider and map an OIDC profile', async () => {
    fetchFn.mockResolvedValue(
      jsonResponse({
        sub: 'g-123',
        email: 'person@example.com',
        name: 'Person',
        picture: 'https://img.example.com/p.png',
      })
    );

    const profile = await verifier.verify(
      { provider: 'google', access_token: 'provider-token' },
      new AbortController().signal
    );

    expect(profile).toEqual({
      subject: 'g-123',
      email: 'person@example.com',
      name: 'Person',
      avatar_url: 'https://img.example.com/p.png',
      role: 'user',
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://accounts.example.com/userinfo');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer provider-token',
      Accept: 'application/json',
    });
  });

  it('should stringify numeric ids and read avatar_url', async () => {
    fetchFn.mockResolvedValue(
      jsonResponse({ id: 4242, email: null, avatar_url: 'https://img.example.com/a.png' })
    );

    const profile = await verifier.verify(
      { provider: 'github', access_token: 'provider-token' },
      new AbortController().signal
    );

    expect(profile).toEqual({
      subject: '4242',
      email: null,
      name: null,
      avatar_url: 'https://img.example.com/a.png',
      role: 'user',
    });
  });

  it('should reject a provider it has no endpoint for without calling out', async () => {
    await expect(
      verifier.verify({ provider: 'myspace', access_token: 't' }, new AbortController().signal)
    ).rejects.toMatchObject({
      code: 'PROFILE_VERIFICATION_FAILED',
      message: "Unsupported provider 'myspace'",
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should fail when the provider refuses the token', async () => {
    fetchFn.mockResolvedValue(jsonResponse({ error: 'invalid_token' }, 401));

    const error = await verifier
      .verify({ provider: 'google', access_token: 'expired' }, new AbortController().signal)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProfileVerificationFailedError);
    expect(error).toMatchObject({
      message: 'Profile provider rejected the access token',
      details: { provider: 'google', status: 401 },
    });
  });

  it('should fail on a body that is not JSON', async () => {
    fetchFn.mockResolvedValue(new Response('<html></html>', { status: 200 }));

    await expect(
      verifier.verify({ provider: 'google', access_token: 't' }, new AbortController().signal)
    ).rejects.toMatchObject({ message: 'Profile response is not JSON' });
  });

  it('should fail when the profile has no subject', async () => {
    fetchFn.mockResolvedValue(jsonResponse({ email: 'person@example.com' }));

    await expect(
      verifier.verify({ provider: 'google', access_token: 't' }, new AbortController().signal)
    ).rejects.toMatchObject({ message: 'Profile response has no subject' });
  });

  it('should report an unreachable provider', async () => {
    fetchFn.mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      verifier.verify({ provider: 'google', access_token: 't' }, new AbortController().signal)
    ).rejects.toMatchObject({ message: 'Profile provider unreachable' });
  });

  it('should pass the abort error through once the signal fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const aborted = new Error('This operation was aborted');
    fetchFn.mockRejectedValue(aborted);

    await expect(
      verifier.verify({ provider: 'google', access_token: 't' }, controller.signal)
    ).rejects.toBe(aborted);
    expect(fetchFn.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
  });
});
