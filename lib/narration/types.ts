import type { SessionState } from "@/lib/game-state";

export type NarrationMode = "remote" | "fallback";

/**
 * One way of turning a player action into narration. The engine holds
 * exactly one for its whole lifetime.
 */
export interface NarrationStrategy {
  readonly mode: NarrationMode;
  narrate(action: string, state: SessionState): Promise<string>;
}
