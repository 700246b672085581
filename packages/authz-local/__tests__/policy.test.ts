/**
 * Route policy tests
 *
 * Covers the route-class table, master targeting and cross-user refusal.
 */

import { describe, it, expect } from 'vitest';
import {
  ForbiddenError,
  TargetUserRequiredError,
  type AccessTokenPrincipal,
  type ApiKeyPrincipal,
  type MasterPrincipal,
} from '@tollgate/core';
import { ROUTE_POLICIES, authorizeRoute } from '../src/index.js';

const master: MasterPrincipal = { kind: 'master', is_admin: true };
const apiKey: ApiKeyPrincipal = {
  kind: 'api_key',
  user_id: 'user-1',
  api_key_id: 'key-1',
  is_admin: false,
};
const accessToken: AccessTokenPrincipal = {
  kind: 'access_token',
  user_id: 'user-1',
  api_key_id: 'key-1',
  session_id: 'session-1',
  is_admin: false,
};

describe('authorizeRoute()', () => {
  describe('call', () => {
    it('should let user principals act as themselves', () => {
      expect(authorizeRoute('call', apiKey)).toEqual({ principal: apiKey, user_id: 'user-1' });
      expect(authorizeRoute('call', accessToken)).toEqual({
        principal: accessToken,
        user_id: 'user-1',
      });
    });

    it('should require a target user for master', () => {
      expect(() => authorizeRoute('call', master)).toThrow(TargetUserRequiredError);
      expect(() => authorizeRoute('call', master, '')).toThrow(
        "When using the master key, the 'user' parameter is required"
      );
      expect(authorizeRoute('call', master, 'user-9')).toEqual({
        principal: master,
        user_id: 'user-9',
      });
    });
  });

  describe('self', () => {
    it('should refuse master', () => {
      expect(() => authorizeRoute('self', master, 'user-1')).toThrow(ForbiddenError);
    });

    it('should resolve user principals to their own user', () => {
      expect(authorizeRoute('self', accessToken).user_id).toBe('user-1');
    });
  });

  describe('admin', () => {
    it('should accept only master, with no effective user', () => {
      expect(authorizeRoute('admin', master)).toEqual({ principal: master, user_id: null });
      expect(() => authorizeRoute('admin', apiKey)).toThrow(ForbiddenError);
      expect(() => authorizeRoute('admin', accessToken)).toThrow(ForbiddenError);
    });
  });

  describe('profile', () => {
    it('should accept all kinds and require a master target', () => {
      expect(authorizeRoute('profile', apiKey).user_id).toBe('user-1');
      expect(authorizeRoute('profile', master, 'user-2').user_id).toBe('user-2');
      expect(() => authorizeRoute('profile', master)).toThrow(TargetUserRequiredError);
    });
  });

  it('should accept a user principal naming itself', () => {
    expect(authorizeRoute('profile', apiKey, 'user-1').user_id).toBe('user-1');
  });

  it('should refuse a user principal naming another user', () => {
    let caught: unknown;
    try {
      authorizeRoute('profile', accessToken, 'user-2');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ForbiddenError);
    expect(caught).toMatchObject({ statusCode: 403, code: 'FORBIDDEN' });
  });

  it('should report the refused kind', () => {
    expect(() => authorizeRoute('admin', apiKey)).toThrow(
      'This route does not accept api_key credentials'
    );
  });

  it('should keep master target requirements in the policy table', () => {
    expect(ROUTE_POLICIES.call.master_target).toBe('required');
    expect(ROUTE_POLICIES.profile.master_target).toBe('required');
    expect(ROUTE_POLICIES.self.allowed).not.toContain('master');
  });
});
