/**
 * PROMPT INTERPRETER
 *
 * Free text -> ParsedItinerary through one language-model call.
 *
 * Failure kinds:
 * - NoCredential: no model key configured
 * - Upstream: model API returned a non-success status
 * - EmptyResponse: model answered with no text
 * - MalformedResponse: answer is not the expected JSON object
 */

import type { ParsedItinerary } from "@shared/schema";
import type { LLMClient } from "../llm/client";
import type { Logger } from "../logger";
import { createSilentLogger } from "../logger";
import { EmptyResponseError, MalformedResponseError, NoCredentialError } from "../errors";
import { buildSystemInstruction, type PromptContext } from "./prompt";
import { decodeItinerary, type DecodeOptions } from "./decode";

export interface InterpretContext extends PromptContext, DecodeOptions {
  logger?: Logger;
}

const FENCED = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/;

/**
 * Remove a surrounding Markdown code fence, if any.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(FENCED);
  return match ? match[1].trim() : trimmed;
}

/**
 * Parse the model's text as JSON. Falls back to the outermost {...} span when
 * the model wrapped the object in prose.
 */
export function parseModelJson(text: string): unknown {
  const body = stripCodeFences(text);
  try {
    return JSON.parse(body);
  } catch (error) {
    const jsonMatch = body.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new MalformedResponseError("Could not parse response: no JSON found", { cause: error });
    }
    try {
      return JSON.parse(jsonMatch[0]);
    } catch (innerError) {
      throw new MalformedResponseError("Could not parse response: invalid JSON", { cause: innerError });
    }
  }
}

export async function interpret(
  promptText: string,
  llm: LLMClient,
  context: InterpretContext = {}
): Promise<ParsedItinerary> {
  const logger = context.logger ?? createSilentLogger();

  if (!llm.isAvailable()) {
    throw new NoCredentialError("No language model API key — add one in settings");
  }

  const system = buildSystemInstruction(promptText, context);
  const text = await llm.complete({ system, user: promptText });

  if (!text.trim()) {
    throw new EmptyResponseError();
  }

  const raw = parseModelJson(text);
  const { itinerary, defaulted } = decodeItinerary(raw, context);

  if (defaulted.length > 0) {
    logger.warn("Model answer had fields replaced by defaults", { fields: defaulted });
  }
  logger.debug("Interpreted itinerary", {
    stops: itinerary.stops.length,
    origin: itinerary.origin ?? null,
  });

  return itinerary;
}
