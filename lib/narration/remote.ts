import type { NarrationBackend } from "@/lib/ai/backend";
import { buildScenePrompt } from "@/lib/ai/prompts";
import { GameError, isGameError } from "@/lib/errors";
import type { SessionState } from "@/lib/game-state";
import type { NarrationStrategy } from "./types";

function isAuthFailure(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if (!("statusCode" in error)) return false;
  return error.statusCode === 401 || error.statusCode === 403;
}

function toBackendError(error: unknown): GameError {
  if (isGameError(error)) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new GameError(
    isAuthFailure(error) ? "unauthorized:narrator" : "offline:narrator",
    { detail, cause: error }
  );
}

/**
 * Narrates through a remote backend. The scene counter is left alone:
 * progression on this path is part of the generated story.
 */
export class RemoteNarrator implements NarrationStrategy {
  readonly mode = "remote";

  constructor(
    private readonly backend: NarrationBackend,
    private readonly systemPrompt: string
  ) {}

  async narrate(action: string, state: SessionState): Promise<string> {
    const prompt = buildScenePrompt({ action, state });

    let text: string;
    try {
      text = await this.backend.generate({ system: this.systemPrompt, prompt });
    } catch (error) {
      const backendError = toBackendError(error);
      console.error("[NARRATOR] Remote backend call failed:", backendError.toLogLine());
      throw backendError;
    }

    if (typeof text !== "string" || text.trim().length === 0) {
      throw new GameError("bad_response:narrator", {
        detail: "backend returned no text",
      });
    }

    return text;
  }
}
