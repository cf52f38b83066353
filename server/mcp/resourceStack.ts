import { logWarn } from "../utils/logger";
import { getErrorMessage } from "../utils/errorHandler";
import type { ResourceScope } from "./types";

type Release = {
  label: string;
  release: () => Promise<void>;
};

export type ReleaseFailure = {
  label: string;
  error: unknown;
};

/**
 * LIFO stack of release callbacks. close() runs every callback, newest
 * first, even when earlier ones throw.
 */
export class ResourceStack implements ResourceScope {
  private releases: Release[] = [];

  defer(label: string, release: () => Promise<void>): void {
    this.releases.push({ label, release });
  }

  get size(): number {
    return this.releases.length;
  }

  async close(): Promise<ReleaseFailure[]> {
    const failures: ReleaseFailure[] = [];

    for (let entry = this.releases.pop(); entry; entry = this.releases.pop()) {
      try {
        await entry.release();
      } catch (error) {
        failures.push({ label: entry.label, error });
        logWarn(`[Session] Failed to release ${entry.label}: ${getErrorMessage(error)}`);
      }
    }

    return failures;
  }
}
