import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { fromZodError } from "zod-validation-error";
import { PROVIDER_CONSTANTS } from "../config/constants";
import { getErrorMessage, logError } from "../utils/errorHandler";
import { logInfo } from "../utils/logger";
import type { Capability, ProviderContext } from "./types";

const publishedSchema = z.object({
  type: z.literal("object"),
  properties: z.record(z.object({}).passthrough()).optional(),
  required: z.array(z.string()).optional(),
}).passthrough();

export type PublishedCapability = {
  name: string;
  description: string;
  inputSchema: z.infer<typeof publishedSchema>;
};

export type CapabilityResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function describeCapability(capability: Capability): PublishedCapability {
  const { $schema: _ignored, ...schema } = zodToJsonSchema(z.object(capability.inputShape), {
    target: "openApi3",
  });
  return {
    name: capability.name,
    description: capability.description,
    inputSchema: publishedSchema.parse(schema),
  };
}

function textResult(text: string, isError = false): CapabilityResult {
  return {
    content: [{ type: "text", text }],
    ...(isError && { isError }),
  };
}

export async function runCapability(
  ctx: ProviderContext,
  capabilities: readonly Capability[],
  name: string,
  args: unknown,
): Promise<CapabilityResult> {
  const capability = capabilities.find((candidate) => candidate.name === name);
  if (!capability) {
    return textResult(`Unknown tool: ${name}`, true);
  }

  const parsed = z.object(capability.inputShape).safeParse(args ?? {});
  if (!parsed.success) {
    return textResult(`Invalid arguments for ${name}: ${fromZodError(parsed.error).message}`, true);
  }

  const start = Date.now();
  try {
    const text = await capability.handler(ctx, parsed.data);
    logInfo(`[Provider] ${name} completed`, { capability: name, duration: Date.now() - start });
    return textResult(text);
  } catch (error) {
    logError(`Provider:${name}`, error);
    return textResult(`Error running ${name}: ${getErrorMessage(error)}`, true);
  }
}

export function createProviderServer(ctx: ProviderContext, capabilities: readonly Capability[]): Server {
  const server = new Server(
    { name: PROVIDER_CONSTANTS.SERVER_NAME, version: PROVIDER_CONSTANTS.SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  const published = capabilities.map(describeCapability);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: published }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    runCapability(ctx, capabilities, request.params.name, request.params.arguments),
  );

  return server;
}
