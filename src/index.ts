export { JwtAuthenticator, createJwtAuthenticator } from "./core/JwtAuthenticator.js";
export type { JwtAuthenticatorOptions } from "./types/config.js";
export type { AuthCallbacks, AuthOutcome, AuthRequest } from "./types/request.js";
export type { JwtClaims, ProfileEnricher, UserProfile } from "./types/profile.js";
export type { CachedCredential, CredentialCache } from "./types/cache.js";
export type { ClaimsSchema, TokenVerifier } from "./types/verifier.js";
export type { Logger } from "./types/logger.js";

export { InMemoryCredentialCache } from "./cache/inMemory.js";
export { RedisCredentialCache } from "./cache/redis.js";
export type { RedisLikeClient } from "./cache/redis.js";
export { JoseVerifier } from "./verifiers/jose.js";
export type { JoseVerifierOptions } from "./verifiers/jose.js";

export { extractClaims, jwtClaimsSchema } from "./utils/jwt.js";
export { mapClaimsToProfile, JWT_PROVIDER } from "./profile/mapper.js";
export * as base64url from "./utils/base64url.js";
export {
  JwtAuthError,
  DecodeError,
  MalformedTokenError,
  MalformedClaimsError,
  MissingSubjectError,
  VerificationError,
  ConfigurationError,
} from "./errors.js";

// Export version tracking
export { getVersionInfo, VERSION } from "./version.js";
