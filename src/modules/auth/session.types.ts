import { z } from "zod";

export const principalSchema = z.object({
  jti: z.string(),
  ifId: z.string(),
  platformCreatorId: z.string(),
  platformCreatorUsername: z.string(),
  platformCreatorDisplayName: z.string(),
  email: z.string(),
  whatsapp: z.string()
});

/**
 * Snapshot of the creator taken at login and stored with the session, so requests
 * can be authenticated without a database round trip.
 */
export type Principal = z.infer<typeof principalSchema>;

export interface PutSessionResult {
  evicted: string[];
}

export interface SessionStore {
  /** Inserts the session and trims the user's set to the configured bound, oldest first. */
  put(username: string, sessionId: string, principal: Principal): Promise<PutSessionResult>;
  exists(username: string, sessionId: string): Promise<boolean>;
  get(username: string, sessionId: string): Promise<Principal | null>;
  remove(username: string, sessionId: string): Promise<boolean>;
  /** Live session ids, oldest first. */
  list(username: string): Promise<string[]>;
}

export const compareSessionIds = (left: string, right: string): number => {
  const leftNumber = Number(left);
  const rightNumber = Number(right);

  if (left.length > 0 && right.length > 0 && Number.isFinite(leftNumber) && Number.isFinite(rightNumber)) {
    return leftNumber - rightNumber;
  }

  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
};
