import { z } from "zod";
import { GameError } from "@/lib/errors";
import type { Character } from "./types";

export const characterSchema = z.object({
  name: z.string().trim().min(1),
  ancestry: z.string().trim().min(1),
  characterClass: z.string().trim().min(1),
  level: z.number().int().positive(),
  hitPoints: z.number().int().nonnegative(),
});

export type CharacterInput = z.input<typeof characterSchema>;

/**
 * Validates a character sheet and returns a fresh, mutable character.
 */
export function createCharacter(input: CharacterInput): Character {
  const result = characterSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new GameError("bad_request:character", { detail });
  }
  return { ...result.data };
}

/**
 * Applies damage in place, flooring hit points at zero.
 * Negative amounts are rejected rather than treated as healing.
 */
export function applyDamage(character: Character, amount: number): number {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new GameError("bad_request:damage", {
      detail: `${character.name} received ${amount}`,
    });
  }
  character.hitPoints = Math.max(character.hitPoints - amount, 0);
  return character.hitPoints;
}

export function isConscious(character: Character): boolean {
  return character.hitPoints > 0;
}
