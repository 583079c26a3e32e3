import { SeededRandom } from "@cryptforge/contracts";
import { describe, expect, it } from "vitest";
import { adjustDifficulty, generateEncounter } from "../src";
import { ScriptedRandom } from "./helpers/scripted-random";

describe("adjustDifficulty", () => {
  it("lowers difficulty by one per extra party member", () => {
    expect(adjustDifficulty(5, 2)).toBe(4);
    expect(adjustDifficulty(3, 1)).toBe(3);
  });

  it("never drops below 1", () => {
    expect(adjustDifficulty(1, 4)).toBe(1);
    expect(adjustDifficulty(-3, 1)).toBe(1);
  });
});

describe("generateEncounter", () => {
  it("scales a forest encounter for a party of four", () => {
    for (let seed = 1; seed <= 50; seed++) {
      const encounter = generateEncounter(
        { difficulty: 1, location: "forest", partySize: 4 },
        { random: new SeededRandom(seed) },
      );

      expect(encounter.difficulty).toBe(1);
      expect(encounter.adjustedDifficulty).toBe(1);
      expect(encounter.environment).toEqual(["Rustling Leaves", "Dense Undergrowth"]);
      expect(encounter.enemies.length).toBeGreaterThanOrEqual(1);
      expect(encounter.enemies.length).toBeLessThanOrEqual(4);
      for (const enemy of encounter.enemies) {
        expect(enemy.level).toBeLessThanOrEqual(2);
      }
    }
  });

  it("traces a cave ambush-free troll pack", () => {
    const encounter = generateEncounter(
      { difficulty: 6, location: "Cave", partySize: 2 },
      { random: new ScriptedRandom([], 0.99) },
    );

    expect(encounter).toMatchObject({
      location: "Cave",
      difficulty: 6,
      adjustedDifficulty: 5,
      environment: ["Echoing Sounds", "Stalactites"],
      isAmbush: false,
    });
    expect(encounter.enemies.map((e) => e.name)).toEqual(["Troll", "Troll", "Troll"]);
  });

  it("ambushes on a low roll", () => {
    const encounter = generateEncounter(
      { difficulty: 1, location: "city", partySize: 1 },
      { random: new ScriptedRandom([], 0.1) },
    );
    expect(encounter.isAmbush).toBe(true);
    expect(encounter.enemies.map((e) => e.name)).toEqual(["Goblin"]);
  });

  it("describes unknown locations generically", () => {
    const encounter = generateEncounter(
      { difficulty: 1, location: "swamp", partySize: 1 },
      { random: new SeededRandom(1) },
    );
    expect(encounter.environment).toEqual(["Unknown Area"]);
  });

  it("fields one enemy for an empty or negative party", () => {
    for (const partySize of [0, -5]) {
      for (let seed = 1; seed <= 20; seed++) {
        const encounter = generateEncounter(
          { difficulty: 2, location: "dungeon", partySize },
          { random: new SeededRandom(seed) },
        );
        expect(encounter.enemies).toHaveLength(1);
      }
    }
  });
});
