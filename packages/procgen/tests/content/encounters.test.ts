import type { RoomType } from "@cryptforge/contracts";
import { describe, expect, it } from "vitest";
import { CATALOG } from "../../src/catalog";
import {
  createEncounter,
  generateEncounters,
  selectEnemy,
} from "../../src/passes/content";
import { constant, scripted } from "../helpers/scripted-random";

const rooms = (...types: RoomType[]) =>
  types.map((roomType, id) => ({ id, roomType }));

describe("selectEnemy", () => {
  it("draws among monsters at most one level above the difficulty", () => {
    // difficulty 0 leaves goblin and skeleton; 0.6 picks the second
    expect(selectEnemy(constant(0.6), CATALOG, 0).name).toBe("Skeleton");
    expect(selectEnemy(constant(0.99), CATALOG, 4).name).toBe("Troll");
    expect(selectEnemy(constant(0.99), CATALOG, 1).name).toBe("Skeleton");
  });

  it("falls back to the base monster without drawing", () => {
    const { rng, source } = scripted([]);
    expect(selectEnemy(rng, CATALOG, -1).name).toBe("Goblin");
    expect(source.consumed).toBe(0);
  });

  it("returns an independent copy", () => {
    const enemy = selectEnemy(constant(0), CATALOG, 1);
    const template = CATALOG.monsters.monsters.goblin;

    expect(enemy).toEqual(template);
    expect(enemy).not.toBe(template);
    expect(Object.isFrozen(enemy)).toBe(false);

    enemy.hitPoints = 0;
    enemy.attacks.push({ name: "Bite", damage: "1d4", attackBonus: 0, range: "melee" });
    expect(template?.hitPoints).toBe(8);
    expect(template?.attacks).toHaveLength(1);
  });
});

describe("createEncounter", () => {
  it("fields a single enemy at difficulty 0", () => {
    const encounter = createEncounter(constant(0.1), CATALOG, 7, 0);
    expect(encounter.roomId).toBe(7);
    expect(encounter.difficulty).toBe(0);
    expect(encounter.enemies.map((e) => e.name)).toEqual(["Goblin"]);
    expect(encounter.isAmbush).toBe(true);
  });

  it("caps enemy count at three", () => {
    const encounter = createEncounter(constant(0.99), CATALOG, 2, 5);
    expect(encounter.enemies.map((e) => e.name)).toEqual([
      "Troll",
      "Troll",
      "Troll",
    ]);
    expect(encounter.isAmbush).toBe(false);
  });

  it("copies every enemy separately", () => {
    const encounter = createEncounter(constant(0.99), CATALOG, 2, 5);
    expect(encounter.enemies[0]).not.toBe(encounter.enemies[1]);
  });
});

describe("generateEncounters", () => {
  const layout = rooms("entrance", "chamber", "corridor", "boss", "treasury", "trap");

  it("only considers chambers, boss lairs and treasuries", () => {
    const encounters = generateEncounters(constant(0.5), CATALOG, layout, 1);
    expect(encounters.map((e) => e.roomId)).toEqual([1, 3, 4]);
  });

  it("skips rooms whose roll misses", () => {
    expect(generateEncounters(constant(0.7), CATALOG, layout, 1)).toEqual([]);
  });

  it("does not draw for ineligible rooms", () => {
    const { rng, source } = scripted([]);
    generateEncounters(rng, CATALOG, rooms("entrance", "corridor", "trap"), 1);
    expect(source.consumed).toBe(0);
  });
});
