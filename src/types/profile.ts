/** A decoded JWT payload. */
export type JwtClaims = Record<string, unknown>;

/**
 * The identity produced by a successful authentication.
 *
 * `id`, `displayName` and `provider` are fixed when the profile is built;
 * `extensions` carries whatever a {@link ProfileEnricher} adds from the claims.
 */
export interface UserProfile {
  readonly id: string;
  readonly displayName: string;
  readonly provider: string;
  readonly extensions: Record<string, unknown>;
}

/**
 * Optional hook that copies additional claims onto a profile.
 * Only `profile.extensions` is writable while it runs.
 */
export type ProfileEnricher = (
  profile: UserProfile,
  claims: JwtClaims,
) => void | Promise<void>;
