import { z } from "zod";

export const queryRequestSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
});

export type QueryResponse = {
  response: string;
  tools_used: string[];
};

export type ToolInfo = {
  name: string;
  description: string;
  input_schema: unknown;
};

export type ToolsResponse = {
  tools: ToolInfo[];
};

export type MessageResponse = {
  message: string;
};

export type HealthResponse = {
  status: "healthy";
  connected: boolean;
};

export type ErrorResponse = {
  error: string;
};
