import { describe, expect, it } from "vitest";
import { GameError } from "@/lib/errors";
import { applyDamage, createCharacter } from "./character";
import {
  createDefaultCompanions,
  createPlayerCharacter,
  resolveChoice,
  AVAILABLE_CLASSES,
} from "./defaults";
import { advanceScene, createSessionState, snapshot } from "./session";

describe("snapshot", () => {
  it("renders the placeholder for an empty party", () => {
    const state = createSessionState({ location: "Crypt" });
    expect(snapshot(state)).toBe("Scene: 1\nLocation: Crypt\nParty:\nNo members");
  });

  it("renders one line per member in party order", () => {
    const state = createSessionState({
      location: "Emerald Crypts",
      party: createDefaultCompanions(),
      scene: 4,
    });
    expect(snapshot(state)).toBe(
      [
        "Scene: 4",
        "Location: Emerald Crypts",
        "Party:",
        "- Lira (Half-Elf Rogue lvl. 3) — 22 HP",
        "- Thamior (Elf Wizard lvl. 3) — 16 HP",
      ].join("\n")
    );
  });

  it("reflects damage applied through the shared handle", () => {
    const lira = createCharacter({
      name: "Lira",
      ancestry: "Half-Elf",
      characterClass: "Rogue",
      level: 3,
      hitPoints: 22,
    });
    const state = createSessionState({ location: "Crypt", party: [lira] });
    applyDamage(state.party[0], 30);
    expect(snapshot(state)).toBe(
      "Scene: 1\nLocation: Crypt\nParty:\n- Lira (Half-Elf Rogue lvl. 3) — 0 HP"
    );
    expect(lira.hitPoints).toBe(0);
  });
});

describe("advanceScene", () => {
  it("adds exactly one per call", () => {
    const state = createSessionState({ location: "Crypt", scene: 7 });
    for (let i = 0; i < 5; i++) advanceScene(state);
    expect(state.scene).toBe(12);
  });
});

describe("createSessionState", () => {
  it("copies the party array but keeps the same characters", () => {
    const party = createDefaultCompanions();
    const state = createSessionState({ location: "Crypt", party });
    expect(state.party).not.toBe(party);
    expect(state.party[0]).toBe(party[0]);
  });

  it("rejects a scene below one", () => {
    expect(() => createSessionState({ location: "Crypt", scene: 0 })).toThrow(
      GameError
    );
  });
});

describe("party defaults", () => {
  it("matches choices case-insensitively and falls back to the first option", () => {
    expect(resolveChoice(AVAILABLE_CLASSES, "wizard")).toBe("Wizard");
    expect(resolveChoice(AVAILABLE_CLASSES, "Bard")).toBe("Fighter");
    expect(resolveChoice(AVAILABLE_CLASSES, undefined)).toBe("Fighter");
  });

  it("builds a level one player with 20 hit points", () => {
    expect(
      createPlayerCharacter({ name: "  ", ancestry: "tiefling", characterClass: "cleric" })
    ).toEqual({
      name: "Nameless Hero",
      ancestry: "Tiefling",
      characterClass: "Cleric",
      level: 1,
      hitPoints: 20,
    });
  });
});
