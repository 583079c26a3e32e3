import { DungeonError } from "@cryptforge/contracts";
import { describe, expect, it } from "vitest";
import {
  baseMonster,
  CATALOG,
  loadCatalog,
  locationEnvironment,
  lookup,
  monsterTemplates,
  themeDescription,
  themeSuffix,
} from "../src/catalog";

describe("bundled catalog", () => {
  it("loads every section", () => {
    expect(Object.keys(CATALOG.rooms)).toHaveLength(6);
    expect(monsterTemplates(CATALOG).map((m) => m.name)).toEqual([
      "Goblin",
      "Orc",
      "Skeleton",
      "Troll",
    ]);
    expect(CATALOG.treasures.rare.goldRange).toEqual([200, 1000]);
  });

  it("is deeply frozen", () => {
    expect(Object.isFrozen(CATALOG)).toBe(true);
    expect(Object.isFrozen(CATALOG.monsters.monsters)).toBe(true);
    expect(Object.isFrozen(baseMonster(CATALOG).attacks[0])).toBe(true);
    expect(Object.isFrozen(CATALOG.rooms.chamber.names)).toBe(true);
  });

  it("uses the goblin as base monster", () => {
    expect(baseMonster(CATALOG).name).toBe("Goblin");
    expect(baseMonster(CATALOG).level).toBe(1);
  });
});

describe("loadCatalog", () => {
  it("reports the failing section", () => {
    let caught: unknown;
    try {
      loadCatalog({
        ...CATALOG,
        monsters: { baseMonster: "goblin", monsters: {} },
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DungeonError);
    if (!(caught instanceof DungeonError)) return;
    expect(caught.code).toBe("CATALOG_INVALID");
    expect(caught.message).toBe('Catalog section "monsters" is invalid');
    expect(caught.details?.section).toBe("monsters");
  });

  it("accepts already-parsed data", () => {
    expect(loadCatalog({ ...CATALOG })).toEqual(CATALOG);
  });
});

describe("lookup", () => {
  it("ignores inherited properties", () => {
    expect(lookup({ crypt: 1 }, "crypt")).toBe(1);
    expect(lookup({ crypt: 1 }, "constructor")).toBeUndefined();
    expect(lookup({ crypt: 1 }, "toString")).toBeUndefined();
  });
});

describe("themeSuffix", () => {
  it("is case-insensitive", () => {
    expect(themeSuffix(CATALOG, "CRYPT")).toBe(
      " The air is thick with the stench of decay, and ancient bones litter the floor.",
    );
  });

  it("is empty for unknown themes", () => {
    expect(themeSuffix(CATALOG, "volcano")).toBe("");
    expect(themeSuffix(CATALOG, "__proto__")).toBe("");
  });
});

describe("themeDescription", () => {
  it("fills in size and level", () => {
    expect(themeDescription(CATALOG, "Tower", "large", 4)).toBe(
      "A large wizard's tower of level 4, filled with arcane mysteries and magical dangers.",
    );
  });

  it("falls back to the generic description", () => {
    expect(themeDescription(CATALOG, "volcano", "small", 2)).toBe(
      "A small dungeon of level 2.",
    );
  });

  it("does not expand placeholders inside substituted values", () => {
    expect(themeDescription(CATALOG, "volcano", "{level}", 3)).toBe(
      "A {level} dungeon of level 3.",
    );
  });
});

describe("locationEnvironment", () => {
  it("is case-insensitive", () => {
    expect(locationEnvironment(CATALOG, "Forest")).toEqual([
      "Rustling Leaves",
      "Dense Undergrowth",
    ]);
  });

  it("falls back to an unknown area", () => {
    expect(locationEnvironment(CATALOG, "swamp")).toEqual(["Unknown Area"]);
  });

  it("returns a fresh array each time", () => {
    const first = locationEnvironment(CATALOG, "cave");
    first.push("Lava");
    expect(locationEnvironment(CATALOG, "cave")).toEqual([
      "Echoing Sounds",
      "Stalactites",
    ]);
  });
});
