export type SessionIdGenerator = () => string;

/**
 * Session ids double as the eviction ordering key, so they must grow strictly even
 * when two logins land in the same millisecond.
 */
export const createSessionIdGenerator = (now: () => number = Date.now): SessionIdGenerator => {
  let lastIssued = 0;

  return () => {
    lastIssued = Math.max(now(), lastIssued + 1);
    return String(lastIssued);
  };
};
