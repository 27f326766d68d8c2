import { DecodeError } from "../errors.js";

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * base64url encoding (RFC 7515), unpadded.
 */
export function encode(bytes: Uint8Array): string {
  return Buffer.from(bytes)
    .toString("base64")
    .replace(/=/g, "")
    .replace(/\+/g, "-")
    .replace(/\//g, "_");
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode base64url, with or without trailing `=` padding.
 */
export function decode(input: string): Uint8Array {
  const value = input.replace(/=+$/, "");
  if (!BASE64URL_ALPHABET.test(value)) {
    throw new DecodeError("Invalid base64url character");
  }
  // A single leftover character cannot encode a whole byte.
  if (value.length % 4 === 1) {
    throw new DecodeError(`Invalid base64url length ${value.length}`);
  }

  const base64 =
    value.replace(/-/g, "+").replace(/_/g, "/") + "===".slice((value.length + 3) % 4);
  return new Uint8Array(Buffer.from(base64, "base64"));
}

export function encodeJson(value: unknown): string {
  return encode(new TextEncoder().encode(JSON.stringify(value)));
}

/** UTF-8 text of a base64url segment. */
export function decodeText(value: string): string {
  const bytes = decode(value);
  try {
    return utf8.decode(bytes);
  } catch {
    throw new DecodeError("Segment is not valid UTF-8");
  }
}
