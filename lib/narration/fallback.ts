import { GameError } from "@/lib/errors";
import { advanceScene, type SessionState } from "@/lib/game-state";
import { pickOne, type RandomSource } from "@/lib/random";
import { NARRATION_WIDTH, wrapText } from "@/lib/text/wrap";
import type { NarrationStrategy } from "./types";

export const DEFAULT_OUTCOMES = [
  "an unexpected encounter with a wandering creature",
  "a hidden clue etched into a worn stone",
  "a trap that springs with a metallic sound",
  "a non-player character pleading for help",
  "an empty room concealing a secret passage",
] as const;

export function composeFallbackScene({
  action,
  scene,
  outcome,
  location,
}: {
  action: string;
  scene: number;
  outcome: string;
  location: string;
}): string {
  return wrapText(
    `As you react to '${action}', scene ${scene} opens: ${outcome}. ` +
      `The party remains at ${location}, but the atmosphere shifts and readies you for the next choice.`,
    NARRATION_WIDTH
  );
}

/**
 * Local narration with no network calls. Each call draws one outcome and
 * advances the scene, so a session keeps moving without a backend.
 */
export class FallbackNarrator implements NarrationStrategy {
  readonly mode = "fallback";
  private readonly outcomes: readonly string[];

  constructor(
    private readonly random: RandomSource = Math.random,
    outcomes: readonly string[] = DEFAULT_OUTCOMES
  ) {
    if (outcomes.length === 0) {
      throw new GameError("bad_request:config", {
        detail: "fallback outcome table is empty",
      });
    }
    this.outcomes = [...outcomes];
  }

  async narrate(action: string, state: SessionState): Promise<string> {
    const outcome = pickOne(this.outcomes, this.random);
    advanceScene(state);

    return composeFallbackScene({
      action,
      scene: state.scene,
      outcome,
      location: state.location,
    });
  }
}
