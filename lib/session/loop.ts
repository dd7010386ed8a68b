import { isGameError } from "@/lib/errors";
import { snapshot, type SessionState } from "@/lib/game-state";
import type { NarrationEngine } from "@/lib/narration";
import type { SessionEvent, SessionRecorder } from "./recorder";

export interface SessionIO {
  // Resolves to null once the input is closed
  prompt(question: string): Promise<string | null>;
  print(text: string): void;
}

export const QUIT_COMMANDS: ReadonlySet<string> = new Set(["quit", "exit"]);

export const SESSION_TEXT = {
  welcome: "Welcome to the table! Type 'quit' to leave.\n",
  question: "What does the player do? ",
  farewell: "Session over. See you next time!",
  emptyAction: "No action entered. Try again.\n",
  narrationHeader: "\n--- Dungeon Master ---",
  summaryHeader: "\nSession summary:",
} as const;

async function recordSafely(
  recorder: SessionRecorder | undefined,
  event: SessionEvent
): Promise<void> {
  if (!recorder) return;
  try {
    await recorder.record(event);
  } catch (error) {
    // Log error but don't fail the turn
    console.error(`[EVENT LOG] Failed to record ${event.eventType}:`, error);
  }
}

/**
 * Runs the read-narrate-print loop until the player quits or input closes.
 * Returns the number of turns that produced narration.
 */
export async function runSession({
  state,
  engine,
  io,
  recorder,
}: {
  state: SessionState;
  engine: NarrationEngine;
  io: SessionIO;
  recorder?: SessionRecorder;
}): Promise<number> {
  let turns = 0;

  io.print(SESSION_TEXT.welcome);
  await recordSafely(recorder, {
    eventType: "session_started",
    actor: "system",
    scene: state.scene,
    payload: {
      mode: engine.mode,
      location: state.location,
      party: state.party.map((member) => member.name),
    },
  });

  while (true) {
    const input = await io.prompt(SESSION_TEXT.question);
    if (input === null) {
      console.log("[SESSION] Input closed, ending session");
      return turns;
    }

    const action = input.trim();
    if (QUIT_COMMANDS.has(action.toLowerCase())) {
      io.print(SESSION_TEXT.farewell);
      return turns;
    }
    if (!action) {
      io.print(SESSION_TEXT.emptyAction);
      continue;
    }

    await recordSafely(recorder, {
      eventType: "player_action",
      actor: "player",
      scene: state.scene,
      payload: { action },
    });

    let narration: string;
    try {
      narration = await engine.narrate(action, state);
    } catch (error) {
      if (!isGameError(error)) throw error;

      console.error("[SESSION] Narration failed:", error.toLogLine());
      io.print(`\n[!] ${error.message}\n`);
      await recordSafely(recorder, {
        eventType: "narrator_error",
        actor: "narrator",
        scene: state.scene,
        payload: { code: error.code, message: error.message },
      });
      continue;
    }

    turns += 1;
    io.print(SESSION_TEXT.narrationHeader);
    io.print(narration);
    io.print(SESSION_TEXT.summaryHeader);
    io.print(snapshot(state));
    io.print("\n");

    await recordSafely(recorder, {
      eventType: "narrator_response",
      actor: "narrator",
      scene: state.scene,
      payload: { mode: engine.mode, narration },
    });
  }
}
