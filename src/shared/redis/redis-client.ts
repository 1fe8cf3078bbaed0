import { Redis } from "ioredis";

import { logger as rootLogger } from "../../config/logger.js";

const logger = rootLogger.child("redis");

export interface RedisClientConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  commandTimeoutMs: number;
}

/**
 * Builds a client that stays disconnected until {@link connectRedisClient} is called.
 * Commands time out after `commandTimeoutMs` instead of waiting for a reconnect.
 */
export const createRedisClient = (config: RedisClientConfig): Redis => {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    lazyConnect: true,
    commandTimeout: config.commandTimeoutMs,
    connectTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: 1
  });

  client.on("error", (error: unknown) => {
    logger.error("Redis connection error", error);
  });

  return client;
};

export const connectRedisClient = async (client: Redis): Promise<void> => {
  await client.connect();
  await client.ping();
  logger.info(`Redis client connected to ${client.options.host ?? "localhost"}:${client.options.port ?? 6379}`);
};

export const closeRedisClient = async (client: Redis): Promise<void> => {
  if (client.status === "end" || client.status === "wait") {
    client.disconnect();
    return;
  }

  await client.quit();
};
