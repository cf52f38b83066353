/**
 * Converts provider capability descriptors into model function declarations.
 *
 * Only `type`, `description` and `enum` survive per parameter: the
 * function-declaration format accepts a restricted JSON Schema subset.
 * A descriptor whose schema is not an object-with-properties is skipped,
 * never fatal to the batch.
 */

import type { CapabilityDeclaration, CapabilityDescriptor, DeclaredParameter } from "./types";
import { isRecord, isStringArray } from "../utils/guards";
import { logWarn } from "../utils/logger";

export type TranslationResult = {
  declarations: CapabilityDeclaration[];
  /** Names of descriptors that were dropped. */
  skipped: string[];
};

type DeclaredSchema = CapabilityDeclaration["parameters"];

function emptySchema(): DeclaredSchema {
  return { type: "object", properties: {}, required: [] };
}

function toDeclaredParameter(schema: Record<string, unknown>): DeclaredParameter {
  const parameter: DeclaredParameter = {};
  if (typeof schema.type === "string") parameter.type = schema.type;
  if (typeof schema.description === "string") parameter.description = schema.description;
  if (Array.isArray(schema.enum)) parameter.enum = [...schema.enum];
  return parameter;
}

/**
 * Returns null when the schema cannot be read as an object with properties.
 */
function interpretSchema(inputSchema: unknown): DeclaredSchema | null {
  if (inputSchema === undefined || inputSchema === null) {
    return emptySchema();
  }
  if (!isRecord(inputSchema)) {
    return null;
  }

  const { properties, required } = inputSchema;
  if (properties !== undefined && !isRecord(properties)) {
    return null;
  }

  const declared: Record<string, DeclaredParameter> = {};
  for (const [name, schema] of Object.entries(isRecord(properties) ? properties : {})) {
    // Non-object property schemas carry nothing the model can use
    if (isRecord(schema)) {
      declared[name] = toDeclaredParameter(schema);
    }
  }

  return {
    type: "object",
    properties: declared,
    required: isStringArray(required) ? [...required] : [],
  };
}

export function translateCapabilities(descriptors: readonly CapabilityDescriptor[]): TranslationResult {
  const declarations: CapabilityDeclaration[] = [];
  const skipped: string[] = [];

  for (const descriptor of descriptors) {
    const parameters = interpretSchema(descriptor.inputSchema);
    if (!parameters) {
      skipped.push(descriptor.name);
      continue;
    }

    declarations.push({
      name: descriptor.name,
      description: descriptor.description || `Tool: ${descriptor.name}`,
      parameters,
    });
  }

  return { declarations, skipped };
}

export function translate(descriptors: readonly CapabilityDescriptor[]): CapabilityDeclaration[] {
  const { declarations, skipped } = translateCapabilities(descriptors);
  if (skipped.length > 0) {
    logWarn(`[Translator] Skipped ${skipped.length} capabilities with unusable schemas: ${skipped.join(", ")}`);
  }
  return declarations;
}
