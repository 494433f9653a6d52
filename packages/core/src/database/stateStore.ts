/**
 * Durable storage for one game instance's serialized snapshot.
 * The host owns durability; the engine only reads and writes whole snapshots.
 */
export interface StateStore {
  read(): Promise<string | null>;
  write(data: string): Promise<void>;
}

/** Process-local store, used by tests and the offline simulator. */
export class MemoryStateStore implements StateStore {
  private data: string | null = null;
  private writes = 0;

  async read(): Promise<string | null> {
    return this.data;
  }

  async write(data: string): Promise<void> {
    this.data = data;
    this.writes++;
  }

  getWriteCount(): number {
    return this.writes;
  }
}
