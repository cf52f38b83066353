import type { ProviderContext } from "./types";
import { ResilientFetch } from "./resilientFetch";
import { CoordinateCache } from "./geocoding";

export function makeProviderContext(overrides: Partial<ProviderContext> = {}): ProviderContext {
  return {
    http: overrides.http ?? new ResilientFetch(),
    coordinates: overrides.coordinates ?? new CoordinateCache(),
    now: overrides.now ?? (() => new Date()),
  };
}
