import { createCharacter } from "./character";
import type { Character } from "./types";

export const DEFAULT_LOCATION = "Emerald Crypts";

export const AVAILABLE_ANCESTRIES = [
  "Human",
  "Elf",
  "Dwarf",
  "Halfling",
  "Tiefling",
] as const;

export const AVAILABLE_CLASSES = [
  "Fighter",
  "Rogue",
  "Wizard",
  "Cleric",
  "Ranger",
] as const;

export const PLAYER_DEFAULTS = {
  name: "Nameless Hero",
  level: 1,
  hitPoints: 20,
} as const;

/**
 * Matches a choice against a list, case-insensitively.
 * Unknown or missing choices fall back to the first entry.
 */
export function resolveChoice(
  options: readonly string[],
  choice: string | undefined
): string {
  const wanted = choice?.trim().toLowerCase();
  const match = options.find((option) => option.toLowerCase() === wanted);
  return match ?? options[0];
}

export function createPlayerCharacter({
  name,
  ancestry,
  characterClass,
}: {
  name?: string;
  ancestry?: string;
  characterClass?: string;
}): Character {
  return createCharacter({
    name: name?.trim() || PLAYER_DEFAULTS.name,
    ancestry: resolveChoice(AVAILABLE_ANCESTRIES, ancestry),
    characterClass: resolveChoice(AVAILABLE_CLASSES, characterClass),
    level: PLAYER_DEFAULTS.level,
    hitPoints: PLAYER_DEFAULTS.hitPoints,
  });
}

// Sample companions; callers can drop or replace them
export function createDefaultCompanions(): Character[] {
  return [
    createCharacter({
      name: "Lira",
      ancestry: "Half-Elf",
      characterClass: "Rogue",
      level: 3,
      hitPoints: 22,
    }),
    createCharacter({
      name: "Thamior",
      ancestry: "Elf",
      characterClass: "Wizard",
      level: 3,
      hitPoints: 16,
    }),
  ];
}
