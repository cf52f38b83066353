/**
 * Provider connector over stdio.
 *
 * Spawns `<command> ...args <target>`, runs the protocol initialize
 * handshake, and adapts the SDK client to ProviderConnection.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import { z } from "zod";
import type { CapabilityDescriptor, ProviderConnection, ProviderConnector, ToolCallPayload } from "./types";
import { PROVIDER_CONSTANTS } from "../config/constants";

export type StdioConnectorOptions = {
  command: string;
  /** Arguments placed before the target script. */
  args?: string[];
  env?: Record<string, string>;
};

const toolResultSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }).passthrough(),
  ).default([]),
  isError: z.boolean().optional(),
}).passthrough();

/**
 * Reduces a tools/call result to its text. Non-text content is named, not dropped.
 */
export function toToolPayload(result: unknown): ToolCallPayload {
  const parsed = toolResultSchema.parse(result);
  const content = parsed.content
    .map(item => (item.type === "text" && item.text !== undefined ? item.text : `[${item.type} content]`))
    .join("\n");

  return { content, isError: parsed.isError === true };
}

export function buildProviderEnvironment(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env = getDefaultEnvironment();
  for (const name of PROVIDER_CONSTANTS.FORWARDED_ENV) {
    const value = source[name];
    if (value !== undefined) env[name] = value;
  }
  return env;
}

/**
 * Adapts a connected SDK client to ProviderConnection.
 */
export function connectionFromClient(
  client: Client,
  callTimeoutMs: number = PROVIDER_CONSTANTS.CALL_TIMEOUT_MS,
): ProviderConnection {
  return {
    async listTools(): Promise<CapabilityDescriptor[]> {
      const { tools } = await client.listTools();
      return tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      }));
    },

    async callTool(name, args): Promise<ToolCallPayload> {
      const result = await client.callTool({ name, arguments: args }, undefined, { timeout: callTimeoutMs });
      return toToolPayload(result);
    },

    onClosed(listener) {
      client.onclose = listener;
    },
  };
}

export function createStdioConnector(options: StdioConnectorOptions): ProviderConnector {
  return async (target, scope) => {
    const transport = new StdioClientTransport({
      command: options.command,
      args: [...(options.args ?? []), target],
      env: options.env ?? buildProviderEnvironment(),
      stderr: "inherit",
    });
    scope.defer("stdio transport", () => transport.close());

    const client = new Client({
      name: PROVIDER_CONSTANTS.CLIENT_NAME,
      version: PROVIDER_CONSTANTS.CLIENT_VERSION,
    });

    // connect() starts the process and completes the initialize handshake
    await client.connect(transport);
    scope.defer("client session", () => client.close());

    return connectionFromClient(client);
  };
}
