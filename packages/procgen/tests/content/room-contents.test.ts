import { describe, expect, it } from "vitest";
import { CATALOG } from "../../src/catalog";
import { generateRoomContents } from "../../src/passes/content";
import { constant, scripted } from "../helpers/scripted-random";

describe("generateRoomContents", () => {
  it("lists the fixed props of a room type without drawing", () => {
    const { rng, source } = scripted([]);
    expect(generateRoomContents(rng, CATALOG, "corridor")).toEqual([
      "Torch",
      "Cobwebs",
      "Stone Debris",
    ]);
    expect(source.consumed).toBe(0);
  });

  it("adds an altar to a chamber on a low roll", () => {
    expect(generateRoomContents(constant(0.1), CATALOG, "chamber")).toEqual([
      "Pillars",
      "Ancient Tapestries",
      "Dust",
      "Altar",
    ]);
  });

  it("leaves the altar out on a high roll", () => {
    expect(generateRoomContents(constant(0.3), CATALOG, "chamber")).toEqual([
      "Pillars",
      "Ancient Tapestries",
      "Dust",
    ]);
  });

  it("returns a copy of the catalog props", () => {
    const contents = generateRoomContents(constant(0.5), CATALOG, "boss");
    contents.push("Bones");
    expect(CATALOG.contents.boss.props).toEqual([
      "Throne",
      "Dark Altar",
      "Evil Symbols",
    ]);
  });
});
