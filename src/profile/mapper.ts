import { MissingSubjectError } from "../errors.js";
import type { JwtClaims, ProfileEnricher, UserProfile } from "../types/profile.js";

export const JWT_PROVIDER = "JWT";

export interface ProfileMappingOptions {
  /** Claim holding the bearer's identity. */
  subject: string;
  enrichProfile?: ProfileEnricher;
}

/**
 * Build a profile whose `id` and `displayName` are the subject claim.
 *
 * The identity fields are frozen before `enrichProfile` runs, so the hook can
 * only add to `extensions`; the returned profile is frozen entirely.
 */
export async function mapClaimsToProfile(
  claims: JwtClaims,
  options: ProfileMappingOptions,
): Promise<UserProfile> {
  const userId = claims[options.subject];
  if (typeof userId !== "string") {
    throw new MissingSubjectError(options.subject);
  }

  const extensions: Record<string, unknown> = {};
  const profile: UserProfile = Object.freeze({
    id: userId,
    displayName: userId,
    provider: JWT_PROVIDER,
    extensions,
  });

  if (options.enrichProfile) {
    await options.enrichProfile(profile, claims);
  }

  Object.freeze(extensions);
  return profile;
}
