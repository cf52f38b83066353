import type { z } from "zod";
import type { ResilientFetch } from "./resilientFetch";
import type { CoordinateCache } from "./geocoding";

export type ProviderContext = {
  http: ResilientFetch;
  coordinates: CoordinateCache;
  now: () => Date;
};

/**
 * A capability served by the provider process. Arguments are validated
 * against `inputShape` before `handler` runs; the handler answers with text.
 */
export interface Capability<Shape extends z.ZodRawShape = z.ZodRawShape> {
  name: string;
  description: string;
  inputShape: Shape;
  handler(ctx: ProviderContext, input: z.infer<z.ZodObject<Shape>>): Promise<string>;
}

export function defineCapability<Shape extends z.ZodRawShape>(capability: Capability<Shape>): Capability<Shape> {
  return capability;
}
