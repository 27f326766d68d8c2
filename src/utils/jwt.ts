import { z } from "zod";
import { MalformedClaimsError, MalformedTokenError } from "../errors.js";
import type { JwtClaims } from "../types/profile.js";
import { decodeText } from "./base64url.js";

/** Any JSON object; arrays, `null` and scalars are rejected. */
export const jwtClaimsSchema = z.record(z.string(), z.unknown());

/**
 * Decode the claims segment of a JWT without verifying anything.
 *
 * Accepts unsigned (`header.claims`) and signed (`header.claims.signature`)
 * tokens. Throws `MalformedTokenError` for any other segment count,
 * `DecodeError` for invalid base64url or UTF-8 and `MalformedClaimsError` when the
 * segment is not a JSON object.
 *
 * This MUST NOT be used on its own to authenticate a request; run a
 * `TokenVerifier` over the token first.
 */
export function extractClaims(token: string): JwtClaims {
  const parts = token.split(".");
  if (parts.length !== 2 && parts.length !== 3) {
    throw new MalformedTokenError(parts.length);
  }

  const text = decodeText(parts[1]);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MalformedClaimsError("Claims segment is not valid JSON", { cause: err });
  }

  const parsed = jwtClaimsSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedClaimsError("Claims segment is not a JSON object");
  }
  return parsed.data;
}
