import type { JsonObject } from "../utils/guards";

// The vocabulary the gateway uses to talk about capabilities and model turns

/**
 * A capability as the provider lists it. `inputSchema` is whatever the
 * provider sent; the schema translator decides whether it is usable.
 */
export type CapabilityDescriptor = {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema?: unknown;
};

export type DeclaredParameter = {
  type?: string;
  description?: string;
  enum?: unknown[];
};

/**
 * The model-facing form of a CapabilityDescriptor.
 */
export type CapabilityDeclaration = {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, DeclaredParameter>;
    required: string[];
  };
};

export type Invocation = {
  name: string;
  args: JsonObject;
};

/**
 * One part of a model turn, classified once at the model-client boundary.
 */
export type TurnPart =
  | { kind: "text"; text: string }
  | { kind: "invocation"; invocation: Invocation }
  | { kind: "unrecognized"; detail: string };

export type ModelTurn = {
  parts: TurnPart[];
};

/**
 * Chat-capable model backend. `Chat` is whatever handle the backend uses to
 * keep conversation history between messages.
 */
export interface ModelClient<Chat> {
  startChat(): Chat;
  sendMessage(chat: Chat, text: string, declarations?: CapabilityDeclaration[]): Promise<ModelTurn>;
}

export type TranscriptResult = {
  response: string;
  /** Every capability the model asked for, in order, whether or not it succeeded. */
  toolsUsed: string[];
};

export type ToolCallPayload = {
  content: string;
  isError: boolean;
};

/**
 * A live, initialized connection to the provider process.
 */
export interface ProviderConnection {
  listTools(): Promise<CapabilityDescriptor[]>;
  callTool(name: string, args: JsonObject): Promise<ToolCallPayload>;
  /** Called once if the transport goes away on its own (e.g. the process exits). */
  onClosed(listener: () => void): void;
}

/**
 * Receives release callbacks while a connection is being acquired; they run
 * in reverse order when the session is torn down.
 */
export interface ResourceScope {
  defer(label: string, release: () => Promise<void>): void;
}

export type ProviderConnector = (target: string, scope: ResourceScope) => Promise<ProviderConnection>;
