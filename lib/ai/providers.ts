import { createGateway } from "@ai-sdk/gateway";
import {
  extractReasoningMiddleware,
  wrapLanguageModel,
} from "ai";

const THINKING_SUFFIX_REGEX = /-thinking$/;

export const DEFAULT_NARRATOR_MODEL = "openai/gpt-4o-mini";

export type GatewayProvider = ReturnType<typeof createGateway>;

export type NarratorLanguageModel = ReturnType<GatewayProvider["languageModel"]>;

// Anything that resolves a model id; the gateway in production
export interface LanguageModelSource {
  languageModel(modelId: string): NarratorLanguageModel;
}

export function createNarratorGateway(apiKey: string): GatewayProvider {
  return createGateway({ apiKey });
}

/**
 * Resolves a model id. Ids ending in `-thinking` (or naming a reasoning
 * model) get their `<thinking>` block stripped so only the narration
 * reaches the player.
 */
export function getLanguageModel(
  provider: LanguageModelSource,
  modelId: string
): NarratorLanguageModel {
  const isReasoningModel =
    modelId.includes("reasoning") || modelId.endsWith("-thinking");

  if (!isReasoningModel) {
    return provider.languageModel(modelId);
  }

  return wrapLanguageModel({
    model: provider.languageModel(modelId.replace(THINKING_SUFFIX_REGEX, "")),
    middleware: extractReasoningMiddleware({ tagName: "thinking" }),
  });
}
