import { generateText } from "ai";
import {
  DEFAULT_NARRATOR_MODEL,
  type LanguageModelSource,
  type NarratorLanguageModel,
  createNarratorGateway,
  getLanguageModel,
} from "./providers";

export interface NarrationRequest {
  system: string;
  prompt: string;
}

/**
 * A remote text generator. The engine only needs call/response; transport,
 * auth and retries belong to the implementation.
 */
export interface NarrationBackend {
  generate(request: NarrationRequest): Promise<string>;
}

export const DEFAULT_NARRATOR_TEMPERATURE = 0.7;

export function createLanguageModelBackend({
  model,
  temperature = DEFAULT_NARRATOR_TEMPERATURE,
}: {
  model: NarratorLanguageModel;
  temperature?: number;
}): NarrationBackend {
  return {
    async generate({ system, prompt }) {
      const { text } = await generateText({
        model,
        system,
        prompt,
        temperature,
      });
      return text;
    },
  };
}

/**
 * Backend routed through the AI Gateway. `provider` replaces the gateway
 * built from `apiKey`.
 */
export function createGatewayBackend({
  apiKey,
  model = DEFAULT_NARRATOR_MODEL,
  temperature = DEFAULT_NARRATOR_TEMPERATURE,
  provider = createNarratorGateway(apiKey),
}: {
  apiKey: string;
  model?: string;
  temperature?: number;
  provider?: LanguageModelSource;
}): NarrationBackend {
  return createLanguageModelBackend({
    model: getLanguageModel(provider, model),
    temperature,
  });
}
