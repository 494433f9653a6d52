// Separate entry point for migration utilities (Node-only, imports `fs`).
// Usage: import { migrateToLatest } from "@rpswager/core/src/migrate";
export { migrateToLatest } from "./database/migrate";
export type { MigrateOptions } from "./database/migrate";
