import { InMemoryCredentialCache } from "../cache/inMemory.js";
import {
    ConfigurationError,
    DecodeError,
    MalformedClaimsError,
    MalformedTokenError,
    MissingSubjectError,
} from "../errors.js";
import { mapClaimsToProfile } from "../profile/mapper.js";
import type { CachedCredential, CredentialCache } from "../types/cache.js";
import {
    jwtAuthenticatorOptionsSchema,
    type JwtAuthenticatorOptions,
    type ResolvedJwtAuthenticatorOptions,
} from "../types/config.js";
import type { Logger } from "../types/logger.js";
import type { ProfileEnricher, UserProfile } from "../types/profile.js";
import type { AuthCallbacks, AuthOutcome, AuthRequest } from "../types/request.js";
import type { ClaimsSchema, TokenVerifier } from "../types/verifier.js";
import { extractClaims, jwtClaimsSchema } from "../utils/jwt.js";

const BEARER_PREFIX = /^Bearer\s+/;

/**
 * Authenticates requests carrying a bearer JWT.
 *
 * On first receipt a token is verified, its claims are mapped to a
 * `UserProfile`, and the profile is cached against the raw token so later
 * receipts skip verification. `tokenTimeToLive` bounds how long a cached
 * profile is trusted.
 *
 * Requests whose scheme header does not name this authenticator are passed
 * on untouched, so several authenticators can be tried in turn.
 */
export class JwtAuthenticator {
    /** Value the scheme header must carry for this authenticator to act. */
    readonly name = "JWT";
    /** This authenticator never redirects to a login page. */
    readonly redirecting = false;
    readonly tokenTimeToLive?: number;

    private readonly verifier: TokenVerifier;
    private readonly subject: string;
    private readonly enrichProfile?: ProfileEnricher;
    private readonly cache: CredentialCache;
    private readonly claimsSchema: ClaimsSchema;
    private readonly schemeHeader: string;
    private readonly credentialHeader: string;
    private readonly logger: Logger;

    constructor(opts: JwtAuthenticatorOptions) {
        const resolved = parseOptions(opts);
        this.verifier = resolved.verifier;
        this.subject = resolved.subject;
        this.tokenTimeToLive = resolved.tokenTimeToLive;
        this.enrichProfile = resolved.enrichProfile;
        this.logger = resolved.logger ?? console;
        this.cache = resolved.cache ?? new InMemoryCredentialCache({ logger: this.logger });
        this.claimsSchema = resolved.claimsSchema ?? jwtClaimsSchema;
        this.schemeHeader = resolved.schemeHeader;
        this.credentialHeader = resolved.credentialHeader;
    }

    /** Callback form of {@link resolve}: exactly one callback fires, once. */
    async authenticate(request: AuthRequest, callbacks: AuthCallbacks): Promise<void> {
        const outcome = await this.resolve(request);
        switch (outcome.kind) {
            case "success":
                return callbacks.onSuccess(outcome.profile);
            case "failure":
                return callbacks.onFailure(outcome.status, outcome.headers);
            case "pass":
                return callbacks.onPass(outcome.status, outcome.headers);
        }
    }

    async resolve(request: AuthRequest): Promise<AuthOutcome> {
        if (readHeader(request, this.schemeHeader) !== this.name) {
            return { kind: "pass" };
        }

        const token = normalizeToken(readHeader(request, this.credentialHeader));
        if (!token) {
            this.logger.debug(`[JwtAuthenticator] Missing ${this.credentialHeader} header`);
            return { kind: "failure" };
        }

        const cached = await this.lookupCached(token);
        if (cached) {
            return { kind: "success", profile: cached };
        }

        try {
            await this.verifier.verify(token, this.claimsSchema);
        } catch (err) {
            this.logger.info("[JwtAuthenticator] JWT can't be verified:", err);
            return { kind: "failure" };
        }

        let profile: UserProfile;
        try {
            const claims = extractClaims(token);
            profile = await mapClaimsToProfile(claims, {
                subject: this.subject,
                enrichProfile: this.enrichProfile,
            });
        } catch (err) {
            if (err instanceof MissingSubjectError) {
                this.logger.warn(`[JwtAuthenticator] Unable to create user profile: JWT claims do not contain '${this.subject}'`);
            } else if (
                err instanceof MalformedTokenError ||
                err instanceof MalformedClaimsError ||
                err instanceof DecodeError
            ) {
                this.logger.error("[JwtAuthenticator] Couldn't decode claims:", err);
            } else {
                this.logger.error("[JwtAuthenticator] Profile enrichment failed:", err);
            }
            return { kind: "failure" };
        }

        try {
            await this.cache.store(token, profile);
        } catch (err) {
            this.logger.warn("[JwtAuthenticator] Failed to cache credential:", err);
        }
        return { kind: "success", profile };
    }

    /** Cached profile for `token`, or undefined when absent or older than the TTL. */
    private async lookupCached(token: string): Promise<UserProfile | undefined> {
        let cached: CachedCredential | undefined;
        try {
            cached = await this.cache.lookup(token);
        } catch (err) {
            this.logger.warn("[JwtAuthenticator] Credential cache lookup failed, verifying token:", err);
            return undefined;
        }
        if (!cached) return undefined;

        if (this.tokenTimeToLive === undefined) {
            return cached.profile;
        }
        // Stale entries are left in place; the next successful verification overwrites them.
        if (Date.now() < cached.createdAt + this.tokenTimeToLive * 1000) {
            return cached.profile;
        }
        return undefined;
    }
}

export function createJwtAuthenticator(opts: JwtAuthenticatorOptions): JwtAuthenticator {
    return new JwtAuthenticator(opts);
}

function parseOptions(opts: JwtAuthenticatorOptions): ResolvedJwtAuthenticatorOptions {
    const parsed = jwtAuthenticatorOptionsSchema.safeParse(opts);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(`[JwtAuthenticator] Invalid options: ${details}`);
    }
    return parsed.data;
}

/** Header names are matched case-insensitively; repeated headers use the first value. */
function readHeader(request: AuthRequest, name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(request.headers)) {
        if (key.toLowerCase() !== wanted) continue;
        return Array.isArray(value) ? value[0] : value;
    }
    return undefined;
}

function normalizeToken(raw: string | undefined): string | undefined {
    if (raw === undefined) return undefined;
    const token = BEARER_PREFIX.test(raw) ? raw.replace(BEARER_PREFIX, "") : raw;
    return token.length > 0 ? token : undefined;
}
