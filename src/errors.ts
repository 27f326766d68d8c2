export type JwtAuthErrorCode =
  | "decode_error"
  | "malformed_token"
  | "malformed_claims"
  | "missing_subject"
  | "token_expired"
  | "invalid_signature"
  | "invalid_claims"
  | "invalid_token"
  | "invalid_configuration";

export class JwtAuthError extends Error {
  constructor(
    public readonly code: JwtAuthErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "JwtAuthError";
  }
}

/** A token segment is not valid base64url. */
export class DecodeError extends JwtAuthError {
  constructor(message: string) {
    super("decode_error", message);
    this.name = "DecodeError";
  }
}

/** The token does not have two or three segments. */
export class MalformedTokenError extends JwtAuthError {
  constructor(public readonly segmentCount: number) {
    super("malformed_token", `Expected 2 or 3 token segments, got ${segmentCount}`);
    this.name = "MalformedTokenError";
  }
}

export class MalformedClaimsError extends JwtAuthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed_claims", message, options);
    this.name = "MalformedClaimsError";
  }
}

export class MissingSubjectError extends JwtAuthError {
  constructor(public readonly subject: string) {
    super("missing_subject", `JWT claims do not contain a string '${subject}'`);
    this.name = "MissingSubjectError";
  }
}

export type VerificationErrorCode = Extract<
  JwtAuthErrorCode,
  "token_expired" | "invalid_signature" | "invalid_claims" | "invalid_token"
>;

export class VerificationError extends JwtAuthError {
  constructor(code: VerificationErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "VerificationError";
  }
}

export class ConfigurationError extends JwtAuthError {
  constructor(message: string) {
    super("invalid_configuration", message);
    this.name = "ConfigurationError";
  }
}
