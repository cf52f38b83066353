/**
 * Gemini Model Registry
 *
 * Single source of truth for the chat models the gateway can drive.
 * GEMINI_MODEL in the environment may name any of these (or any other
 * gemini-* identifier the API accepts); FLASH is the default.
 */

export const GEMINI_MODELS = {
  /**
   * Fast, inexpensive model with function calling.
   * Good default for routing a travel question to one or more capabilities.
   */
  FLASH: "gemini-2.5-flash",

  /**
   * Lowest-latency tier. Adequate when queries map to a single capability.
   */
  FLASH_LITE: "gemini-2.5-flash-lite",

  /**
   * Strongest reasoning tier, for multi-capability questions.
   */
  PRO: "gemini-2.5-pro",
} as const;

export type GeminiModelType = typeof GEMINI_MODELS[keyof typeof GEMINI_MODELS];

export const DEFAULT_MODEL: GeminiModelType = GEMINI_MODELS.FLASH;

export const GENERATION_DEFAULTS = {
  MAX_OUTPUT_TOKENS: 1000,
} as const;
