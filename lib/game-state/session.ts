import { GameError } from "@/lib/errors";
import type { Character, SessionState } from "./types";
import { EMPTY_PARTY_PLACEHOLDER, INITIAL_SCENE } from "./types";

/**
 * Creates the state for a new session. The caller owns the returned object
 * and passes the same reference to every narration call.
 */
export function createSessionState({
  location,
  party = [],
  scene = INITIAL_SCENE,
}: {
  location: string;
  party?: Character[];
  scene?: number;
}): SessionState {
  if (!Number.isInteger(scene) || scene < INITIAL_SCENE) {
    throw new GameError("bad_request:config", {
      detail: `scene must be a positive integer, got ${scene}`,
    });
  }
  return { location, party: [...party], scene };
}

function formatMember(member: Character): string {
  return `- ${member.name} (${member.ancestry} ${member.characterClass} lvl. ${member.level}) — ${member.hitPoints} HP`;
}

/**
 * Renders the canonical snapshot of the session
 */
export function snapshot(state: SessionState): string {
  const memberLines =
    state.party.length > 0
      ? state.party.map(formatMember)
      : [EMPTY_PARTY_PLACEHOLDER];

  return [
    `Scene: ${state.scene}`,
    `Location: ${state.location}`,
    "Party:",
    ...memberLines,
  ]
    .join("\n")
    .trim();
}

export function advanceScene(state: SessionState): void {
  state.scene += 1;
}
