import {
  createRemoteJWKSet,
  errors as joseErrors,
  jwtVerify,
  type JWTVerifyGetKey,
  type KeyLike,
} from "jose";

import { VerificationError } from "../errors.js";
import type { ClaimsSchema, TokenVerifier } from "../types/verifier.js";

export type JoseKeySource =
  /** Shared HMAC secret (HS256/384/512). */
  | { secret: string | Uint8Array }
  | { publicKey: KeyLike | Uint8Array }
  /** JSON Web Key Set fetched and cached by `jose`. */
  | { jwksUri: string };

export type JoseVerifierOptions = JoseKeySource & {
  algorithms?: string[];
  issuer?: string | string[];
  audience?: string | string[];
  clockToleranceSeconds?: number;
};

export class JoseVerifier implements TokenVerifier {
  private readonly getKey: JWTVerifyGetKey;

  constructor(private readonly options: JoseVerifierOptions) {
    this.getKey = resolveKey(options);
  }

  async verify(token: string, claimsSchema: ClaimsSchema): Promise<void> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.getKey, {
        algorithms: this.options.algorithms,
        issuer: this.options.issuer,
        audience: this.options.audience,
        clockTolerance: this.options.clockToleranceSeconds,
      }));
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        throw new VerificationError("token_expired", "Token has expired", { cause: error });
      }
      if (error instanceof joseErrors.JWTClaimValidationFailed) {
        throw new VerificationError("invalid_claims", error.message, { cause: error });
      }
      if (error instanceof joseErrors.JWSSignatureVerificationFailed) {
        throw new VerificationError("invalid_signature", "Token signature is invalid", { cause: error });
      }
      throw new VerificationError("invalid_token", "Token verification failed", { cause: error });
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new VerificationError(
        "invalid_claims",
        `Token claims do not match the expected schema: ${parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ")}`,
        { cause: parsed.error },
      );
    }
  }
}

function resolveKey(source: JoseKeySource): JWTVerifyGetKey {
  if ("jwksUri" in source) {
    return createRemoteJWKSet(new URL(source.jwksUri));
  }
  const key =
    "secret" in source
      ? typeof source.secret === "string"
        ? new TextEncoder().encode(source.secret)
        : source.secret
      : source.publicKey;
  return () => key;
}
