import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import type { ErrorResponse } from "@shared/schema";
import { writeLog } from "./logger";

/**
 * The part of an Express response the route helpers write to.
 */
export type JsonResponse = Pick<Response, "status" | "json">;

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  code = "validation_failed";
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends Error implements AppError {
  statusCode = 500;
  code = "configuration_invalid";
  isOperational = false;
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The provider process could not be spawned or did not complete the handshake.
 */
export class ConnectionError extends Error implements AppError {
  statusCode = 503;
  code = "provider_unavailable";
  isOperational = true;
  readonly target: string;
  constructor(target: string, cause?: unknown) {
    super(`Failed to connect to capability provider ${target}: ${describeCause(cause)}`, { cause });
    this.name = "ConnectionError";
    this.target = target;
  }
}

export class NotConnectedError extends Error implements AppError {
  statusCode = 409;
  code = "not_connected";
  isOperational = true;
  constructor(message = "Not connected to any server") {
    super(message);
    this.name = "NotConnectedError";
  }
}

/**
 * One capability invocation failed. Local to that invocation: the session
 * stays up and the dispatcher turns this into diagnostic text.
 */
export class CapabilityExecutionError extends Error implements AppError {
  statusCode = 502;
  code = "capability_failed";
  isOperational = true;
  readonly capability: string;
  constructor(capability: string, cause: unknown) {
    super(`${capability} failed: ${describeCause(cause)}`, { cause });
    this.name = "CapabilityExecutionError";
    this.capability = capability;
  }
}

export class ModelBackendError extends Error implements AppError {
  statusCode = 502;
  code = "model_backend_failed";
  isOperational = true;
  constructor(cause: unknown) {
    super(`Error calling model backend: ${describeCause(cause)}`, { cause });
    this.name = "ModelBackendError";
  }
}

export class UnknownPoiCategoryError extends ValidationError {
  readonly category: string;
  readonly available: readonly string[];
  constructor(category: string, available: readonly string[]) {
    super(`Unknown POI type: ${category}. Available: ${available.join(", ")}`);
    this.name = "UnknownPoiCategoryError";
    this.category = category;
    this.available = available;
  }
}

// Plain-string causes (e.g. a provider's error text) are kept verbatim
function describeCause(cause: unknown): string {
  if (typeof cause === "string" && cause.length > 0) {
    return cause;
  }
  return getErrorMessage(cause);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: JsonResponse,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    logError(context, error);
  }

  const body: ErrorResponse = { error: message };
  res.status(statusCode).json(body);
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  writeLog("error", `[${context}] ${message}`, stack ? { stack } : undefined);
}
