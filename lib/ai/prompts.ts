/**
 * Prompts for the Narrator.
 *
 * The persona goes out as the system message; the scene prompt carries the
 * state snapshot and the player's action for a single turn.
 */

import { snapshot, type SessionState } from "@/lib/game-state";

export const NARRATOR_SYSTEM_PROMPT =
  "You are a Dungeon Master who faithfully follows the game state you are given. " +
  "Narrate in a classic fantasy voice, stay consistent and never cheat with the rules.";

export const SCENE_PREAMBLE =
  "You are an expert Dungeon Master. Describe the next scene.";

export const SCENE_INSTRUCTIONS = [
  "Respond in 4-6 concise sentences.",
  "Maintain a consistent medieval fantasy tone.",
  "Do not change the rules or established facts; only narrate the outcome.",
] as const;

export const buildScenePrompt = ({
  action,
  state,
}: {
  action: string;
  state: SessionState;
}): string => {
  const parts = [
    SCENE_PREAMBLE,
    `Current state:\n${snapshot(state)}`,
    `Instructions:\n${SCENE_INSTRUCTIONS.map((line) => `- ${line}`).join("\n")}`,
    `Player action: ${action}`,
  ];

  return parts.join("\n\n");
};
