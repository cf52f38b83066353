/**
 * Gateway Runtime
 *
 * Wires the session manager, the Gemini client and the dispatcher for one
 * process. Tests build these pieces directly with fakes instead.
 *
 * Usage:
 * - const gateway = createGateway(config)
 * - await gateway.sessions.connect(gateway.target)
 * - await gateway.dispatcher.dispatch("What's the weather in Lisbon?")
 *
 * Layer: MCP (orchestration)
 */

import type { Chat } from "@google/genai";
import type { AppConfig } from "../config/env";
import { GeminiModelClient } from "../llm/client";
import { ConversationDispatcher } from "./dispatcher";
import { SessionManager } from "./sessionManager";
import { createStdioConnector } from "./stdioTransport";

export type Gateway = {
  sessions: SessionManager;
  dispatcher: ConversationDispatcher<Chat>;
  /** Provider target the HTTP routes connect to. */
  target: string;
};

export function createGateway(config: AppConfig): Gateway {
  const sessions = new SessionManager(createStdioConnector({
    command: config.providerCommand,
    args: config.providerCommandArgs,
  }));

  const model = new GeminiModelClient({
    apiKey: config.geminiApiKey,
    model: config.geminiModel,
  });

  return {
    sessions,
    dispatcher: new ConversationDispatcher(sessions, model),
    target: config.providerScript,
  };
}
