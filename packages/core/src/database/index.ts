// Connection
export { createDb, getPoolConfig } from "./database";

// Types
export type { Database, RoundsTable, Round, NewRound } from "./types";

// Models
export { createRound, listRounds, listRoundsForPlayer } from "./models/rounds";

// Migration: not re-exported here to avoid pulling `fs` into every consumer.
// Import from "@rpswager/core/src/migrate" instead.

// Snapshot stores
export { MemoryStateStore } from "./stateStore";
export type { StateStore } from "./stateStore";
export { createRedisClient, RedisStateStore } from "./redis";

// Config
export { getDatabaseUrl, getRedisUrl, getInstanceKey } from "./config";
