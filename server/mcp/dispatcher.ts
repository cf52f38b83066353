/**
 * Conversation Dispatcher
 *
 * Purpose:
 * Drives one user query through the model: offers the provider's current
 * capabilities, runs each invocation the model asks for through the session,
 * and feeds each result back to the model for interpretation.
 *
 * Tool use is single-level. A capability result goes through the model
 * exactly once; if the model's interpretation asks for another capability,
 * that request is reported in the transcript but not executed.
 *
 * Failure policy:
 * - The first model call failing is fatal to the query (ModelBackendError).
 * - A capability failure, or the model failing while interpreting a result,
 *   becomes "<capability> failed: <cause>" text and the loop moves on.
 *
 * Layer: MCP (orchestration)
 */

import type { SessionManager } from "./sessionManager";
import type { Invocation, ModelClient, ModelTurn, TranscriptResult, TurnPart } from "./types";
import { translate } from "./schemaTranslator";
import { RESPONSE_CONSTANTS } from "../config/constants";
import {
  CapabilityExecutionError,
  ModelBackendError,
  NotConnectedError,
  getErrorMessage,
} from "../utils/errorHandler";
import { logDebug, logInfo, logWarn } from "../utils/logger";

export type CapabilitySession = Pick<SessionManager, "isConnected" | "listCapabilities" | "invoke">;

export type DispatchOptions = {
  correlationId?: string;
};

export function formatToolResult(capability: string, content: string): string {
  return `Tool ${capability} returned: ${content}`;
}

export function describeUnrecognizedPart(detail: string): string {
  return `[Skipped unrecognized response part: ${detail}]`;
}

export function describeInvocation(invocation: Invocation): string {
  return `[Called tool ${invocation.name} with args ${JSON.stringify(invocation.args)}]`;
}

export function describeChainedInvocation(invocation: Invocation): string {
  return `[${invocation.name} was not run: chained capability calls are not supported]`;
}

function describeFailure(capability: string, error: unknown): string {
  if (error instanceof CapabilityExecutionError) {
    return error.message;
  }
  return `${capability} failed: ${getErrorMessage(error)}`;
}

export class ConversationDispatcher<Chat> {
  private readonly sessions: CapabilitySession;
  private readonly model: ModelClient<Chat>;

  constructor(sessions: CapabilitySession, model: ModelClient<Chat>) {
    this.sessions = sessions;
    this.model = model;
  }

  async dispatch(query: string, options: DispatchOptions = {}): Promise<TranscriptResult> {
    const meta = options.correlationId ? { correlationId: options.correlationId } : undefined;

    if (!this.sessions.isConnected) {
      throw new NotConnectedError();
    }

    // Re-listed on every query so provider-side changes are picked up
    const descriptors = await this.sessions.listCapabilities();
    const declarations = translate(descriptors);
    logDebug(`[Dispatcher] Offering ${declarations.length} capabilities`, meta);

    const chat = this.model.startChat();
    let turn: ModelTurn;
    try {
      // Some backends reject an empty tools array, so omit it entirely
      turn = declarations.length > 0
        ? await this.model.sendMessage(chat, query, declarations)
        : await this.model.sendMessage(chat, query);
    } catch (error) {
      throw new ModelBackendError(error);
    }

    const transcript: string[] = [];
    const toolsUsed: string[] = [];

    for (const part of turn.parts) {
      switch (part.kind) {
        case "text":
          transcript.push(part.text);
          break;
        case "unrecognized":
          logWarn(`[Dispatcher] Unrecognized model part: ${part.detail}`, meta);
          transcript.push(describeUnrecognizedPart(part.detail));
          break;
        case "invocation":
          toolsUsed.push(part.invocation.name);
          transcript.push(describeInvocation(part.invocation));
          transcript.push(...await this.runInvocation(chat, part.invocation, options));
          break;
        default: {
          const _exhaustive: never = part;
          throw new Error(`[Dispatcher] Unhandled turn part: ${JSON.stringify(_exhaustive)}`);
        }
      }
    }

    logInfo(`[Dispatcher] Query complete, tools used: ${toolsUsed.join(", ") || "none"}`, meta);

    return {
      response: transcript.length > 0 ? transcript.join("\n") : RESPONSE_CONSTANTS.NO_RESPONSE_SENTINEL,
      toolsUsed,
    };
  }

  /**
   * Executes one invocation and returns the transcript lines it produced.
   */
  private async runInvocation(chat: Chat, invocation: Invocation, options: DispatchOptions): Promise<string[]> {
    const meta = { capability: invocation.name, ...(options.correlationId !== undefined && { correlationId: options.correlationId }) };

    let content: string;
    try {
      const payload = await this.sessions.invoke(invocation.name, invocation.args);
      content = payload.content;
    } catch (error) {
      logWarn(`[Dispatcher] Capability failed: ${getErrorMessage(error)}`, meta);
      return [describeFailure(invocation.name, error)];
    }

    let interpretation: ModelTurn;
    try {
      interpretation = await this.model.sendMessage(chat, formatToolResult(invocation.name, content));
    } catch (error) {
      logWarn(`[Dispatcher] Model failed to interpret result: ${getErrorMessage(error)}`, meta);
      return [describeFailure(invocation.name, error)];
    }

    return interpretation.parts.map((part: TurnPart) => {
      switch (part.kind) {
        case "text":
          return part.text;
        case "invocation":
          logWarn(`[Dispatcher] Ignoring chained request for ${part.invocation.name}`, meta);
          return describeChainedInvocation(part.invocation);
        case "unrecognized":
          return describeUnrecognizedPart(part.detail);
      }
    });
  }
}
