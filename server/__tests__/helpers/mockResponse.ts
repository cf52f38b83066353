import { vi } from "vitest";
import type { JsonResponse } from "../../utils/errorHandler";

/**
 * Express response stand-in: records status and JSON body.
 */
export function mockResponse() {
  const status = vi.fn().mockReturnThis();
  const json = vi.fn().mockReturnThis();
  const res: JsonResponse = { status, json };
  return { res, status, json };
}
