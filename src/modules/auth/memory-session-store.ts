import type { Principal, PutSessionResult, SessionStore } from "./session.types.js";
import { compareSessionIds } from "./session.types.js";

interface UserSessions {
  records: Map<string, Principal>;
  expiresAtMs: number;
}

export interface InMemorySessionStoreOptions {
  maxSessionsPerUser: number;
  ttlSeconds: number;
  now?: () => number;
}

/** Process-local store with the same eviction and expiry rules as the Redis one. */
export class InMemorySessionStore implements SessionStore {
  private readonly users = new Map<string, UserSessions>();
  private readonly maxSessionsPerUser: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  public constructor(options: InMemorySessionStoreOptions) {
    this.maxSessionsPerUser = options.maxSessionsPerUser;
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  public async put(username: string, sessionId: string, principal: Principal): Promise<PutSessionResult> {
    const sessions = this.getLiveSessions(username) ?? { records: new Map<string, Principal>(), expiresAtMs: 0 };
    const evicted: string[] = [];

    if (!sessions.records.has(sessionId)) {
      const ordered = [...sessions.records.keys()].sort(compareSessionIds);
      const overflow = ordered.length - this.maxSessionsPerUser + 1;

      for (const oldest of ordered.slice(0, Math.max(overflow, 0))) {
        sessions.records.delete(oldest);
        evicted.push(oldest);
      }
    }

    sessions.records.set(sessionId, { ...principal });
    sessions.expiresAtMs = this.now() + this.ttlMs;
    this.users.set(username, sessions);

    return { evicted };
  }

  public async exists(username: string, sessionId: string): Promise<boolean> {
    return this.getLiveSessions(username)?.records.has(sessionId) ?? false;
  }

  public async get(username: string, sessionId: string): Promise<Principal | null> {
    const principal = this.getLiveSessions(username)?.records.get(sessionId);
    return principal ? { ...principal } : null;
  }

  public async remove(username: string, sessionId: string): Promise<boolean> {
    const sessions = this.getLiveSessions(username);
    if (!sessions) {
      return false;
    }

    const removed = sessions.records.delete(sessionId);
    if (sessions.records.size === 0) {
      this.users.delete(username);
    }

    return removed;
  }

  public async list(username: string): Promise<string[]> {
    const sessions = this.getLiveSessions(username);
    return sessions ? [...sessions.records.keys()].sort(compareSessionIds) : [];
  }

  private getLiveSessions(username: string): UserSessions | null {
    const sessions = this.users.get(username);
    if (!sessions) {
      return null;
    }

    if (sessions.expiresAtMs <= this.now()) {
      this.users.delete(username);
      return null;
    }

    return sessions;
  }
}
