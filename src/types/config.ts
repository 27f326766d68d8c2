import { z } from "zod";
import type { CredentialCache } from "./cache.js";
import type { Logger } from "./logger.js";
import type { ProfileEnricher } from "./profile.js";
import type { ClaimsSchema, TokenVerifier } from "./verifier.js";

export interface JwtAuthenticatorOptions {
  /** Determines the key and algorithm used to verify received tokens. */
  verifier: TokenVerifier;
  /** Claim used as the bearer's identity. Defaults to `"sub"`. */
  subject?: string;
  /**
   * Seconds a verified token's profile may be reused without verifying the
   * token again. `0` verifies every request; when omitted, cached profiles
   * are reused until evicted.
   */
  tokenTimeToLive?: number;
  enrichProfile?: ProfileEnricher;
  /** Defaults to a new, unbounded `InMemoryCredentialCache`. */
  cache?: CredentialCache;
  /** Schema handed to the verifier; defaults to any JSON object. */
  claimsSchema?: ClaimsSchema;
  /** Header naming the authentication scheme. Defaults to `X-token-type`. */
  schemeHeader?: string;
  /** Header carrying the token. Defaults to `Authorization`. */
  credentialHeader?: string;
  logger?: Logger;
}

const hasMethod = (name: string) => (value: unknown) =>
  typeof value === "object" && value !== null && name in value && typeof Reflect.get(value, name) === "function";

export const jwtAuthenticatorOptionsSchema = z.object({
  verifier: z.custom<TokenVerifier>(hasMethod("verify"), { message: "verifier must implement verify(token, schema)" }),
  subject: z.string().min(1).default("sub"),
  tokenTimeToLive: z.number().nonnegative().finite().optional(),
  enrichProfile: z.custom<ProfileEnricher>((value) => typeof value === "function").optional(),
  cache: z
    .custom<CredentialCache>((value) => hasMethod("lookup")(value) && hasMethod("store")(value), {
      message: "cache must implement lookup(token) and store(token, profile)",
    })
    .optional(),
  claimsSchema: z.custom<ClaimsSchema>(hasMethod("safeParse"), { message: "claimsSchema must be a zod schema" }).optional(),
  schemeHeader: z.string().min(1).default("X-token-type"),
  credentialHeader: z.string().min(1).default("Authorization"),
  logger: z
    .custom<Logger>((value) => ["debug", "info", "warn", "error"].every((name) => hasMethod(name)(value)), {
      message: "logger must implement debug, info, warn and error",
    })
    .optional(),
});

export type ResolvedJwtAuthenticatorOptions = z.output<typeof jwtAuthenticatorOptionsSchema>;
