import type { ZodType } from "zod";
import type { JwtClaims } from "./profile.js";

export type ClaimsSchema = ZodType<JwtClaims>;

/**
 * Proves a token's signature and that its claims decode into `claimsSchema`.
 * Resolves when the token is valid; throws or rejects otherwise.
 */
export interface TokenVerifier {
  verify(token: string, claimsSchema: ClaimsSchema): Promise<void> | void;
}
