import { z } from "zod";
import type { CachedCredential, CredentialCache } from "../types/cache.js";
import type { Logger } from "../types/logger.js";
import type { UserProfile } from "../types/profile.js";

// Minimal Redis-like client interface, satisfied by a connected `redis` client.
// Declared here so the library carries no runtime dependency on a Redis driver.
export interface RedisLikeClient {
    set(key: string, value: string, options?: { EX?: number }): Promise<unknown>;
    get(key: string): Promise<string | null>;
}

const cachedCredentialSchema = z.object({
    profile: z.object({
        id: z.string(),
        displayName: z.string(),
        provider: z.string(),
        extensions: z.record(z.string(), z.unknown()),
    }),
    createdAt: z.number(),
});

export interface RedisCredentialCacheOptions {
    prefix?: string;
    /**
     * Redis-side expiry for each entry. This only evicts; the authenticator's
     * time-to-live is still checked against `createdAt` on every lookup.
     */
    expireSeconds?: number;
    logger?: Logger;
}

/**
 * Credential cache shared between processes through Redis. Profile
 * extensions must be JSON-serialisable.
 */
export class RedisCredentialCache implements CredentialCache {
    private prefix: string;
    private expireSeconds?: number;
    private logger: Logger;

    constructor(
        private redis: RedisLikeClient,
        options?: RedisCredentialCacheOptions,
    ) {
        this.prefix = options?.prefix ?? "jwt-auth:";
        this.expireSeconds = options?.expireSeconds;
        this.logger = options?.logger ?? console;
    }

    async lookup(token: string): Promise<CachedCredential | undefined> {
        const raw = await this.redis.get(`${this.prefix}${token}`);
        if (!raw) return undefined;

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            this.logger.error("[RedisCredentialCache] Failed to parse cached credential:", err);
            return undefined;
        }

        const parsed = cachedCredentialSchema.safeParse(json);
        if (!parsed.success) {
            this.logger.error("[RedisCredentialCache] Cached credential has an unexpected shape:", parsed.error.issues);
            return undefined;
        }

        const { profile, createdAt } = parsed.data;
        return {
            profile: Object.freeze({ ...profile, extensions: Object.freeze(profile.extensions) }),
            createdAt,
        };
    }

    async store(token: string, profile: UserProfile): Promise<void> {
        const value = JSON.stringify({ profile, createdAt: Date.now() });
        const key = `${this.prefix}${token}`;
        if (this.expireSeconds !== undefined) {
            await this.redis.set(key, value, { EX: this.expireSeconds });
        } else {
            await this.redis.set(key, value);
        }
    }
}
