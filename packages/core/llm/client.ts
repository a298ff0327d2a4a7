/**
 * LLM CLIENT WRAPPER
 *
 * Wraps the Gemini API with:
 * - Availability checking (key configured)
 * - A request timeout
 * - Typed failures (NoCredential / Upstream)
 */

import type { GenerateContentParameters, GoogleGenAIOptions } from "@google/genai";
import { NoCredentialError, UpstreamError } from "../errors";

// ============================================
// CLIENT CONTRACT
// ============================================

export interface LLMRequest {
  /** System instruction: parsing rules plus context blocks */
  system: string;
  /** The single user message */
  user: string;
  maxOutputTokens?: number;
}

export interface LLMClient {
  /**
   * Send exactly one completion request and return the raw text reply.
   * Throws NoCredentialError when no key is configured, UpstreamError on API failure.
   */
  complete(request: LLMRequest): Promise<string>;

  isAvailable(): boolean;
}

// ============================================
// GEMINI CLIENT IMPLEMENTATION
// ============================================

export interface GeminiConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
}

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const DEFAULT_MAX_OUTPUT_TOKENS = 1024;
export const DEFAULT_LLM_TIMEOUT_MS = 15_000;

function statusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 0;
}

/**
 * SDK options. A proxy base URL carries its own API version; the public
 * endpoint uses the SDK default.
 */
export function geminiClientOptions(apiKey: string, baseUrl: string | undefined, timeoutMs: number): GoogleGenAIOptions {
  return {
    apiKey,
    httpOptions: baseUrl ? { apiVersion: "", baseUrl, timeout: timeoutMs } : { timeout: timeoutMs },
  };
}

/**
 * One generateContent call. Thinking is off: its tokens count against
 * maxOutputTokens and would cut the JSON answer short.
 */
export function buildGenerateRequest(model: string, request: LLMRequest): GenerateContentParameters {
  return {
    model,
    contents: [{ role: "user", parts: [{ text: request.user }] }],
    config: {
      systemInstruction: request.system,
      maxOutputTokens: request.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
      temperature: 0,
      responseMimeType: "application/json",
      thinkingConfig: { thinkingBudget: 0 },
    },
  };
}

export function createGeminiClient(config: GeminiConfig): LLMClient {
  const apiKey = config.apiKey.trim();
  const baseUrl = config.baseUrl?.trim() || undefined;
  const model = config.model || DEFAULT_GEMINI_MODEL;
  const timeoutMs = config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;

  const isAvailable = (): boolean => apiKey.length > 0 && apiKey !== "your_gemini_api_key_here";

  const complete = async (request: LLMRequest): Promise<string> => {
    if (!isAvailable()) {
      throw new NoCredentialError("No language model API key — add one in settings");
    }

    try {
      // Dynamic import to avoid loading @google/genai if not needed
      const { GoogleGenAI } = await import("@google/genai");

      const ai = new GoogleGenAI(geminiClientOptions(apiKey, baseUrl, timeoutMs));
      const response = await ai.models.generateContent(buildGenerateRequest(model, request));
      return response.text ?? "";
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new UpstreamError(statusOf(error), message, { cause: error });
    }
  };

  return { complete, isAvailable };
}
