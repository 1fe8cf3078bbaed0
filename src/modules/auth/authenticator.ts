import { err, ok } from "../../shared/result.js";
import type { Result, ResultError } from "../../shared/result.js";

import type { Principal, SessionStore } from "./session.types.js";
import type { TokenCodec } from "./token-codec.js";

export type AuthErrorCode =
  | "MISSING_CREDENTIAL"
  | "INVALID_CREDENTIAL"
  | "EXPIRED_CREDENTIAL"
  | "SESSION_NOT_LIVE";

export type AuthError = ResultError<AuthErrorCode>;

export interface AuthenticatedSession {
  principal: Principal;
  username: string;
  sessionId: string;
}

/**
 * Resolves an access token to the principal stored for its session.
 *
 * A valid signature only proves the token was issued here; the session must also
 * still be present in the store, which is how eviction and logout revoke tokens
 * before they expire. Store outages are thrown as `SessionStoreUnavailableError`.
 */
export class Authenticator {
  public constructor(
    private readonly tokenCodec: TokenCodec,
    private readonly sessionStore: SessionStore
  ) {}

  public async verifyRequest(token: string | undefined): Promise<Result<AuthenticatedSession, AuthError>> {
    if (token === undefined || token.trim().length === 0) {
      return err<AuthError>({ code: "MISSING_CREDENTIAL", message: "No access token supplied" });
    }

    const decoded = await this.tokenCodec.verify(token);
    if (!decoded.ok) {
      if (decoded.error.code === "TOKEN_EXPIRED") {
        return err<AuthError>({ code: "EXPIRED_CREDENTIAL", message: decoded.error.message });
      }

      return err<AuthError>({ code: "INVALID_CREDENTIAL", message: decoded.error.message });
    }

    const { subject: username, sessionId } = decoded.value;

    const isLive = await this.sessionStore.exists(username, sessionId);
    if (!isLive) {
      return err<AuthError>({ code: "SESSION_NOT_LIVE", message: "Session was logged out or evicted" });
    }

    const principal = await this.sessionStore.get(username, sessionId);
    if (!principal) {
      return err<AuthError>({ code: "SESSION_NOT_LIVE", message: "Session snapshot is missing" });
    }

    return ok({ principal, username, sessionId });
  }
}
