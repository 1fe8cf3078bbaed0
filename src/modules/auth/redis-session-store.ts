import type { Redis } from "ioredis";
import { z } from "zod";

import { SessionStoreUnavailableError } from "../../shared/errors/session-store-error.js";

import { PUT_SESSION_SCRIPT } from "./put-session.script.js";
import type { Principal, PutSessionResult, SessionStore } from "./session.types.js";
import { compareSessionIds, principalSchema } from "./session.types.js";

export const CREATOR_SESSION_NAMESPACE = "creator:user_tokens";

export type SessionStoreClient = Pick<Redis, "eval" | "hexists" | "hget" | "hdel" | "hkeys">;

export interface RedisSessionStoreOptions {
  keyPrefix: string;
  maxSessionsPerUser: number;
  ttlSeconds: number;
}

export const buildUserSessionsKey = (keyPrefix: string, username: string): string => {
  return `${keyPrefix}:${CREATOR_SESSION_NAMESPACE}:${username}`;
};

const isStringArray = (value: unknown): value is string[] => {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
};

/** Field layout shared with the other services reading `creator:user_tokens` hashes. */
const storedPrincipalSchema = z.object({
  jti: z.string(),
  if_id: z.string(),
  platform_creator_id: z.string(),
  platform_creator_username: z.string(),
  platform_creator_display_name: z.string(),
  email: z.string(),
  whatsapp: z.string()
});

type StoredPrincipal = z.infer<typeof storedPrincipalSchema>;

export const serializePrincipal = (principal: Principal): string => {
  const stored: StoredPrincipal = {
    jti: principal.jti,
    if_id: principal.ifId,
    platform_creator_id: principal.platformCreatorId,
    platform_creator_username: principal.platformCreatorUsername,
    platform_creator_display_name: principal.platformCreatorDisplayName,
    email: principal.email,
    whatsapp: principal.whatsapp
  };

  return JSON.stringify(stored);
};

// Entries may also have been written with camelCase names.
const readablePrincipalSchema = z.union([
  principalSchema,
  storedPrincipalSchema.transform(
    (stored): Principal => ({
      jti: stored.jti,
      ifId: stored.if_id,
      platformCreatorId: stored.platform_creator_id,
      platformCreatorUsername: stored.platform_creator_username,
      platformCreatorDisplayName: stored.platform_creator_display_name,
      email: stored.email,
      whatsapp: stored.whatsapp
    })
  )
]);

const parsePrincipal = (raw: string): Principal | null => {
  let decoded: unknown;

  try {
    decoded = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = readablePrincipalSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
};

export class RedisSessionStore implements SessionStore {
  public constructor(
    private readonly client: SessionStoreClient,
    private readonly options: RedisSessionStoreOptions
  ) {}

  public async put(username: string, sessionId: string, principal: Principal): Promise<PutSessionResult> {
    const reply = await this.run("put", () =>
      this.client.eval(
        PUT_SESSION_SCRIPT,
        1,
        this.keyFor(username),
        this.options.maxSessionsPerUser,
        sessionId,
        serializePrincipal(principal),
        this.options.ttlSeconds
      )
    );

    if (!isStringArray(reply)) {
      throw new SessionStoreUnavailableError("put", new Error("Unexpected reply from put-session script"));
    }

    return { evicted: reply };
  }

  public async exists(username: string, sessionId: string): Promise<boolean> {
    const found = await this.run("exists", () => this.client.hexists(this.keyFor(username), sessionId));
    return found === 1;
  }

  public async get(username: string, sessionId: string): Promise<Principal | null> {
    const raw = await this.run("get", () => this.client.hget(this.keyFor(username), sessionId));
    if (raw === null) {
      return null;
    }

    return parsePrincipal(raw);
  }

  public async remove(username: string, sessionId: string): Promise<boolean> {
    const removed = await this.run("remove", () => this.client.hdel(this.keyFor(username), sessionId));
    return removed > 0;
  }

  public async list(username: string): Promise<string[]> {
    const sessionIds = await this.run("list", () => this.client.hkeys(this.keyFor(username)));
    return [...sessionIds].sort(compareSessionIds);
  }

  private keyFor(username: string): string {
    return buildUserSessionsKey(this.options.keyPrefix, username);
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      throw new SessionStoreUnavailableError(operation, error);
    }
  }
}
