export type { Character, SessionState } from "./types";
export { EMPTY_PARTY_PLACEHOLDER, INITIAL_SCENE } from "./types";
export {
  applyDamage,
  characterSchema,
  createCharacter,
  isConscious,
  type CharacterInput,
} from "./character";
export { advanceScene, createSessionState, snapshot } from "./session";
export {
  AVAILABLE_ANCESTRIES,
  AVAILABLE_CLASSES,
  DEFAULT_LOCATION,
  PLAYER_DEFAULTS,
  createDefaultCompanions,
  createPlayerCharacter,
  resolveChoice,
} from "./defaults";
