import { GoogleGenAI } from "@google/genai";
import type { Chat, FunctionDeclaration, GenerateContentConfig, Part, Tool } from "@google/genai";
import { GENERATION_DEFAULTS } from "../config/models";
import type { CapabilityDeclaration, ModelClient, ModelTurn, TurnPart } from "../mcp/types";
import { isRecord } from "../utils/guards";

export type GeminiClientOptions = {
  apiKey: string;
  model: string;
  maxOutputTokens?: number;
};

/**
 * The subset of a generateContent response the gateway reads.
 */
export type CandidateResponse = {
  candidates?: Array<{ content?: { parts?: Part[] } }>;
};

export function toFunctionTool(declarations: CapabilityDeclaration[]): Tool {
  const functionDeclarations: FunctionDeclaration[] = declarations.map(d => ({
    name: d.name,
    description: d.description,
    parametersJsonSchema: d.parameters,
  }));
  return { functionDeclarations };
}

export function classifyPart(part: Part): TurnPart {
  const call = part.functionCall;
  if (call?.name) {
    return {
      kind: "invocation",
      invocation: { name: call.name, args: isRecord(call.args) ? call.args : {} },
    };
  }

  if (typeof part.text === "string" && part.text.length > 0) {
    return { kind: "text", text: part.text };
  }

  const keys = Object.entries(part)
    .filter(([, value]) => value !== undefined)
    .map(([key]) => key);
  return { kind: "unrecognized", detail: keys.length > 0 ? keys.join(", ") : "empty part" };
}

export function toModelTurn(response: CandidateResponse): ModelTurn {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return { parts: parts.map(classifyPart) };
}

export class GeminiModelClient implements ModelClient<Chat> {
  private readonly ai: GoogleGenAI;
  private readonly model: string;
  private readonly maxOutputTokens: number;

  constructor(options: GeminiClientOptions) {
    if (!options.apiKey) throw new Error("[LLM Client] GEMINI_API_KEY is not set");
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model;
    this.maxOutputTokens = options.maxOutputTokens ?? GENERATION_DEFAULTS.MAX_OUTPUT_TOKENS;
  }

  startChat(): Chat {
    return this.ai.chats.create({
      model: this.model,
      config: { maxOutputTokens: this.maxOutputTokens },
      history: [],
    });
  }

  async sendMessage(chat: Chat, text: string, declarations?: CapabilityDeclaration[]): Promise<ModelTurn> {
    // Per-message config replaces the chat's, so the token limit is repeated here
    const config: GenerateContentConfig = {
      maxOutputTokens: this.maxOutputTokens,
      ...(declarations && declarations.length > 0 && { tools: [toFunctionTool(declarations)] }),
    };

    const response = await chat.sendMessage({ message: text, config });
    return toModelTurn(response);
  }
}
