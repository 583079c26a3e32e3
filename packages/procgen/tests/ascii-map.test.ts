import type { Room, RoomType } from "@cryptforge/contracts";
import { describe, expect, it } from "vitest";
import { renderDungeonMap, renderMapLegend } from "../src/utils/ascii-map";

const room = (id: number, roomType: RoomType, x: number, y: number): Room => ({
  id,
  name: `Room ${id}`,
  description: "",
  roomType,
  contents: [],
  exits: [],
  x,
  y,
});

const rooms = [
  room(0, "entrance", 0, 0),
  room(1, "corridor", 1, 0),
  room(2, "boss", 1, 1),
  room(3, "trap", -1, -1),
];

describe("renderDungeonMap", () => {
  it("draws north at the top", () => {
    expect(renderDungeonMap({ rooms })).toBe("  B\n E.\n^");
  });

  it("renders nothing without rooms", () => {
    expect(renderDungeonMap({ rooms: [] })).toBe("");
  });

  it("uses a custom glyph for empty cells", () => {
    expect(renderDungeonMap({ rooms }, { empty: "#" })).toBe("##B\n#E.\n^##");
  });

  it("colors boss lairs", () => {
    const map = renderDungeonMap({ rooms: [room(0, "boss", 0, 0)] }, { useColors: true });
    expect(map).toBe("\x1b[1m\x1b[31mB\x1b[0m");
  });
});

describe("renderMapLegend", () => {
  it("lists every room type", () => {
    expect(renderMapLegend()).toBe(
      "E entrance  . corridor  C chamber  $ treasury  B boss  ^ trap",
    );
  });
});
