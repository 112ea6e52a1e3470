import { log } from "../../logger";

export interface Pingable {
  query(sql: string): Promise<unknown>;
}

const CACHE_MS = 5_000;

/**
 * Readiness probe for the database. Results are cached briefly so a
 * frequently polled /readyz does not hammer the pool.
 */
export function createReadinessCheck(pool: Pingable, now: () => number = Date.now): () => Promise<boolean> {
  let lastCheckTimestamp = 0;
  let lastResult = false;

  return async function dbReady(): Promise<boolean> {
    const timestamp = now();
    if (lastCheckTimestamp !== 0 && timestamp - lastCheckTimestamp < CACHE_MS) {
      return lastResult;
    }

    try {
      await pool.query("SELECT 1");
      lastResult = true;
    } catch (error) {
      log("Database readiness check failed", "readyz", {
        error: error instanceof Error ? error.message : "unknown error",
      });
      lastResult = false;
    }

    lastCheckTimestamp = timestamp;
    return lastResult;
  };
}
