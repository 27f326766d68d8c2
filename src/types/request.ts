import type { UserProfile } from "./profile.js";

/** Anything carrying Node-style headers, e.g. an `IncomingMessage`. */
export interface AuthRequest {
  headers: Record<string, string | string[] | undefined>;
}

export type AuthOutcome =
  | { kind: "success"; profile: UserProfile }
  | { kind: "failure"; status?: number; headers?: Record<string, string> }
  | { kind: "pass"; status?: number; headers?: Record<string, string> };

export interface AuthCallbacks {
  onSuccess(profile: UserProfile): void;
  onFailure(status?: number, headers?: Record<string, string>): void;
  /** The request does not carry this authenticator's scheme. */
  onPass(status?: number, headers?: Record<string, string>): void;
}
