import { describe, it, expect } from 'vitest';

describe('Index Exports', () => {
  it('should export the authenticator and its factory', async () => {
    const { JwtAuthenticator, createJwtAuthenticator } = await import('../src/index.js');
    expect(typeof JwtAuthenticator).toBe('function');
    expect(typeof createJwtAuthenticator).toBe('function');
  });

  it('should export caches, the jose verifier and the codec', async () => {
    const exports = await import('../src/index.js');

    expect(exports).toHaveProperty('InMemoryCredentialCache');
    expect(exports).toHaveProperty('RedisCredentialCache');
    expect(exports).toHaveProperty('JoseVerifier');
    expect(typeof exports.base64url.encode).toBe('function');
    expect(typeof exports.base64url.decode).toBe('function');
  });

  it('should export every error class under a common base', async () => {
    const { JwtAuthError, DecodeError, MalformedTokenError, MalformedClaimsError, MissingSubjectError, VerificationError, ConfigurationError } =
      await import('../src/index.js');

    expect(new DecodeError('x')).toBeInstanceOf(JwtAuthError);
    expect(new MalformedTokenError(1)).toBeInstanceOf(JwtAuthError);
    expect(new MalformedClaimsError('x')).toBeInstanceOf(JwtAuthError);
    expect(new MissingSubjectError('sub')).toBeInstanceOf(JwtAuthError);
    expect(new VerificationError('invalid_token', 'x')).toBeInstanceOf(JwtAuthError);
    expect(new ConfigurationError('x').code).toBe('invalid_configuration');
  });

  it('should report version info', async () => {
    const { getVersionInfo, VERSION } = await import('../src/index.js');
    expect(getVersionInfo()).toEqual({ name: 'jwt-bearer-auth', version: VERSION });
  });

  it('should not expose type-only exports at runtime', async () => {
    const exports = await import('../src/index.js');
    expect(exports).not.toHaveProperty('JwtAuthenticatorOptions');
    expect(exports).not.toHaveProperty('UserProfile');
  });
});
