/**
 * Session State Types
 *
 * The session state is a plain object owned by whoever starts the session.
 * Every engine call receives the same reference, so mutations (damage,
 * scene advancement) are visible to every holder.
 */

export interface Character {
  name: string;
  ancestry: string;
  characterClass: string;
  level: number;
  hitPoints: number;
}

export interface SessionState {
  location: string;
  // Turn-sheet order; only meaningful for display
  party: Character[];
  scene: number;
}

// Rendered in place of member lines when the party is empty
export const EMPTY_PARTY_PLACEHOLDER = "No members";

export const INITIAL_SCENE = 1;
