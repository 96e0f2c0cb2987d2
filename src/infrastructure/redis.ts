import { Redis } from "ioredis";

import { env } from "../config/env.js";

let connection: Redis | null = null;

// Created on first use so that importing queue code never opens a socket.
export function getRedis(): Redis {
  if (!connection) {
    connection = new Redis(env.REDIS_URL, {
      maxRetriesPerRequest: null
    });
  }

  return connection;
}

export async function closeRedis(): Promise<void> {
  if (connection) {
    const current = connection;
    connection = null;
    await current.quit();
  }
}
