import type { UserProfile } from "./profile.js";

export interface CachedCredential {
  profile: UserProfile;
  /** Epoch milliseconds at which the profile was stored. */
  createdAt: number;
}

/**
 * Key/value store from a raw token string to the profile it last produced.
 *
 * Implementations never verify tokens and never judge staleness; the
 * authenticator compares `createdAt` against its own time-to-live.
 */
export interface CredentialCache {
  lookup(token: string): Promise<CachedCredential | undefined>;
  /** Create or overwrite the entry for `token`, stamped with the current time. */
  store(token: string, profile: UserProfile): Promise<void>;
}
