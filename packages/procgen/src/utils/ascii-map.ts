/**
 * ASCII Dungeon Map
 *
 * Draws the room grid as text, one glyph per room, north at the top.
 *
 * @example
 * ```typescript
 * import { generateDungeon, renderDungeonMap } from "@cryptforge/procgen";
 *
 * const dungeon = generateDungeon({ level: 3, theme: "crypt", size: "small", difficulty: 2 });
 * console.log(renderDungeonMap(dungeon));
 * ```
 */

import { ROOM_TYPES, type Room, type RoomType } from "@cryptforge/contracts";
import { boundsOf, pointKey } from "../core/geometry";

// =============================================================================
// CONFIGURATION
// =============================================================================

export type RoomGlyphs = Readonly<Record<RoomType, string>>;

export const DEFAULT_ROOM_GLYPHS: RoomGlyphs = {
  entrance: "E",
  corridor: ".",
  chamber: "C",
  treasury: "$",
  boss: "B",
  trap: "^",
};

export interface MapRenderOptions {
  /** Glyph per room type */
  readonly glyphs?: RoomGlyphs;
  /** Glyph for cells without a room */
  readonly empty?: string;
  /** Color boss lairs and treasuries (ANSI escape codes) */
  readonly useColors?: boolean;
}

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
} as const;

const ROOM_COLORS: Partial<Record<RoomType, readonly string[]>> = {
  boss: [ANSI.bold, ANSI.red],
  treasury: [ANSI.yellow],
};

function colorize(text: string, codes: readonly string[]): string {
  return codes.join("") + text + ANSI.reset;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render the rooms of a dungeon as lines of glyphs.
 *
 * The grid spans the bounding box of the rooms. Rows run from the largest y
 * (north) down; trailing blanks of each row are dropped. A dungeon without
 * rooms renders as an empty string.
 */
export function renderDungeonMap(
  dungeon: { readonly rooms: readonly Room[] },
  options: MapRenderOptions = {},
): string {
  const { glyphs = DEFAULT_ROOM_GLYPHS, empty = " ", useColors = false } = options;

  const bounds = boundsOf(dungeon.rooms);
  if (!bounds) return "";

  const byCell = new Map<string, RoomType>();
  for (const room of dungeon.rooms) {
    byCell.set(pointKey(room), room.roomType);
  }

  const lines: string[] = [];
  for (let y = bounds.maxY; y >= bounds.minY; y--) {
    let line = "";
    for (let x = bounds.minX; x <= bounds.maxX; x++) {
      const roomType = byCell.get(pointKey({ x, y }));
      if (!roomType) {
        line += empty;
        continue;
      }
      const colors = ROOM_COLORS[roomType];
      line +=
        useColors && colors ? colorize(glyphs[roomType], colors) : glyphs[roomType];
    }
    lines.push(line.trimEnd());
  }

  return lines.join("\n");
}

/**
 * One `glyph name` pair per room type, in room-type order.
 */
export function renderMapLegend(glyphs: RoomGlyphs = DEFAULT_ROOM_GLYPHS): string {
  return ROOM_TYPES.map((roomType) => `${glyphs[roomType]} ${roomType}`).join("  ");
}
