import type { Redis } from "ioredis";

import type { Env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { AccountService } from "./modules/account/account.service.js";
import { Authenticator } from "./modules/auth/authenticator.js";
import { InMemorySessionStore } from "./modules/auth/memory-session-store.js";
import { RedisSessionStore } from "./modules/auth/redis-session-store.js";
import { createSessionIdGenerator } from "./modules/auth/session-id.js";
import type { SessionStore } from "./modules/auth/session.types.js";
import { TokenCodec } from "./modules/auth/token-codec.js";
import { CreatorsRepository } from "./modules/creators/creators.repo.js";
import { loadOpenApiDocument } from "./modules/docs/docs.routes.js";
import { SamplesRepository } from "./modules/samples/samples.repo.js";
import { openDatabase } from "./shared/db/database.js";
import type { SqliteDatabase } from "./shared/db/database.js";
import { closeRedisClient, connectRedisClient, createRedisClient } from "./shared/redis/redis-client.js";

const SECONDS_PER_DAY = 24 * 60 * 60;

export interface AppContext {
  env: Env;
  database: SqliteDatabase;
  redis: Redis | null;
  sessionStore: SessionStore;
  tokenCodec: TokenCodec;
  authenticator: Authenticator;
  samplesRepository: SamplesRepository;
  creatorsRepository: CreatorsRepository;
  accountService: AccountService;
  openApiDocument: unknown;
}

export interface AppContextOverrides {
  sessionStore?: SessionStore;
  tokenCodec?: TokenCodec;
}

const createSessionStore = (env: Env, redis: Redis | null): SessionStore => {
  const ttlSeconds = env.ACCESS_TOKEN_TTL_DAYS * SECONDS_PER_DAY;

  if (!redis) {
    return new InMemorySessionStore({
      maxSessionsPerUser: env.MAX_SESSIONS_PER_USER,
      ttlSeconds
    });
  }

  return new RedisSessionStore(redis, {
    keyPrefix: env.REDIS_PREFIX,
    maxSessionsPerUser: env.MAX_SESSIONS_PER_USER,
    ttlSeconds
  });
};

/**
 * Wires every collaborator explicitly. Nothing here touches the network; call
 * {@link startAppContext} before serving traffic.
 */
export const createAppContext = (env: Env, overrides: AppContextOverrides = {}): AppContext => {
  const database = openDatabase(env.DATABASE_PATH);

  const needsRedis = overrides.sessionStore === undefined && env.SESSION_STORE_DRIVER === "redis";
  const redis = needsRedis
    ? createRedisClient({
        host: env.REDIS_HOST,
        port: env.REDIS_PORT,
        password: env.REDIS_PASSWORD,
        db: env.REDIS_DB,
        commandTimeoutMs: env.SESSION_STORE_TIMEOUT_MS
      })
    : null;

  const sessionStore = overrides.sessionStore ?? createSessionStore(env, redis);
  const tokenCodec =
    overrides.tokenCodec ??
    new TokenCodec({
      secret: env.JWT_SECRET_KEY,
      ttlDays: env.ACCESS_TOKEN_TTL_DAYS
    });

  const samplesRepository = new SamplesRepository(database);
  const creatorsRepository = new CreatorsRepository(database);

  return {
    env,
    database,
    redis,
    sessionStore,
    tokenCodec,
    authenticator: new Authenticator(tokenCodec, sessionStore),
    samplesRepository,
    creatorsRepository,
    accountService: new AccountService({
      samplesRepository,
      creatorsRepository,
      tokenCodec,
      sessionStore,
      nextSessionId: createSessionIdGenerator(),
      accessTokenHeader: env.ACCESS_TOKEN_HEADER
    }),
    openApiDocument: loadOpenApiDocument()
  };
};

export const startAppContext = async (context: AppContext): Promise<void> => {
  if (context.redis) {
    await connectRedisClient(context.redis);
    return;
  }

  logger.warn("Using the in-process session store; sessions are lost on restart");
};

export const closeAppContext = async (context: AppContext): Promise<void> => {
  if (context.redis) {
    await closeRedisClient(context.redis);
  }

  context.database.close();
};
