import type { NarrationBackend } from "@/lib/ai/backend";
import { NARRATOR_SYSTEM_PROMPT } from "@/lib/ai/prompts";
import { GameError } from "@/lib/errors";
import type { SessionState } from "@/lib/game-state";
import type { RandomSource } from "@/lib/random";
import { FallbackNarrator } from "./fallback";
import { RemoteNarrator } from "./remote";
import type { NarrationMode, NarrationStrategy } from "./types";

export interface NarrationEngineOptions {
  // Present: every turn goes to the backend. Absent: local fallback only.
  backend?: NarrationBackend;
  systemPrompt?: string;
  // Fallback only
  random?: RandomSource;
  outcomes?: readonly string[];
}

export class NarrationEngine {
  constructor(private readonly strategy: NarrationStrategy) {}

  get mode(): NarrationMode {
    return this.strategy.mode;
  }

  /**
   * Produces narration for a non-empty player action. The state is the
   * caller's live handle; the fallback path advances its scene counter.
   */
  narrate(action: string, state: SessionState): Promise<string> {
    return this.strategy.narrate(action, state);
  }
}

export function createNarrationEngine({
  backend,
  systemPrompt = NARRATOR_SYSTEM_PROMPT,
  random,
  outcomes,
}: NarrationEngineOptions = {}): NarrationEngine {
  if (systemPrompt.trim().length === 0) {
    throw new GameError("bad_request:config", {
      detail: "narrator system prompt is empty",
    });
  }

  const strategy: NarrationStrategy = backend
    ? new RemoteNarrator(backend, systemPrompt)
    : new FallbackNarrator(random, outcomes);

  console.log(`[NARRATOR] Using ${strategy.mode} narration`);
  return new NarrationEngine(strategy);
}
