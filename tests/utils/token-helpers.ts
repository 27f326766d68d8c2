import { vi } from 'vitest';
import { encodeJson } from '../../src/utils/base64url.js';

/**
 * Build a JWT-shaped token with an unchecked signature segment. Pair it with
 * a stub verifier; use `jose` to sign tokens a real verifier must accept.
 */
export function createJwt(claims: unknown, signature = 'fake_signature'): string {
  const header = encodeJson({ alg: 'HS256', typ: 'JWT' });
  return `${header}.${encodeJson(claims)}.${signature}`;
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
