import { SignJWT, errors, jwtVerify } from "jose";
import type { JWTPayload } from "jose";

import { err, ok } from "../../shared/result.js";
import type { Result, ResultError } from "../../shared/result.js";

const ALGORITHM = "HS256";
const SECONDS_PER_DAY = 24 * 60 * 60;
const RESERVED_CLAIMS = new Set(["sub", "jti", "exp"]);

export interface AccessTokenInput {
  subject: string;
  sessionId: string;
  extra?: Record<string, unknown>;
}

export interface AccessTokenClaims {
  subject: string;
  sessionId: string;
  /** Seconds since the epoch. */
  expiresAt: number;
  extra: Record<string, unknown>;
}

export type TokenErrorCode = "TOKEN_MALFORMED" | "TOKEN_EXPIRED" | "TOKEN_CLAIMS_MISSING";

export type TokenError = ResultError<TokenErrorCode>;

export interface TokenCodecOptions {
  secret: string;
  ttlDays: number;
  clock?: () => Date;
}

const isNonEmptyString = (value: unknown): value is string => {
  return typeof value === "string" && value.length > 0;
};

const pickExtraClaims = (claims: Record<string, unknown>): JWTPayload => {
  const extra: JWTPayload = {};

  for (const [name, value] of Object.entries(claims)) {
    if (!RESERVED_CLAIMS.has(name)) {
      extra[name] = value;
    }
  }

  return extra;
};

export class TokenCodec {
  private readonly secret: Uint8Array;
  private readonly ttlSeconds: number;
  private readonly clock: () => Date;

  public constructor(options: TokenCodecOptions) {
    this.secret = new TextEncoder().encode(options.secret);
    this.ttlSeconds = options.ttlDays * SECONDS_PER_DAY;
    this.clock = options.clock ?? (() => new Date());
  }

  public async issue(input: AccessTokenInput): Promise<string> {
    const issuedAtSeconds = Math.floor(this.clock().getTime() / 1000);
    const payload: JWTPayload = pickExtraClaims(input.extra ?? {});

    return new SignJWT(payload)
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(input.subject)
      .setJti(input.sessionId)
      .setExpirationTime(issuedAtSeconds + this.ttlSeconds)
      .sign(this.secret);
  }

  public async verify(token: string): Promise<Result<AccessTokenClaims, TokenError>> {
    let payload: JWTPayload;

    try {
      const verified = await jwtVerify(token, this.secret, {
        algorithms: [ALGORITHM],
        currentDate: this.clock()
      });
      payload = verified.payload;
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        return err<TokenError>({ code: "TOKEN_EXPIRED", message: "Token has expired" });
      }

      if (error instanceof errors.JOSEError) {
        return err<TokenError>({ code: "TOKEN_MALFORMED", message: `Token rejected: ${error.code}` });
      }

      throw error;
    }

    if (!isNonEmptyString(payload.sub) || !isNonEmptyString(payload.jti) || typeof payload.exp !== "number") {
      return err<TokenError>({ code: "TOKEN_CLAIMS_MISSING", message: "Token is missing sub, jti or exp" });
    }

    return ok({
      subject: payload.sub,
      sessionId: payload.jti,
      expiresAt: payload.exp,
      extra: pickExtraClaims(payload)
    });
  }
}
