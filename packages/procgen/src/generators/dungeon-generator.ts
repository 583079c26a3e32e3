/**
 * Dungeon Assembly
 *
 * Runs the passes in order against one random stream:
 * placement, room contents, encounters, treasures, connectivity.
 */

import type { Dungeon, DungeonRequest, Room } from "@cryptforge/contracts";
import { type Catalog, themeDescription } from "../catalog";
import { buildConnections, exitsByRoom } from "../passes/connectivity/proximity";
import {
  generateEncounters,
  generateRoomContents,
  generateTreasures,
} from "../passes/content";
import { placeRooms } from "../passes/placement/room-placer";

/**
 * Capitalize the first letter of every run of letters and lowercase the rest.
 *
 * @example
 * ```typescript
 * titleCase("dark crypt"); // "Dark Crypt"
 * titleCase("o'NEIL");     // "O'Neil"
 * ```
 */
export function titleCase(text: string): string {
  return text.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}

export function dungeonTitle(theme: string, level: number): string {
  return `${titleCase(theme)} - Level ${level}`;
}

export function assembleDungeon(
  rng: () => number,
  catalog: Catalog,
  request: DungeonRequest,
): Dungeon {
  const placed = placeRooms(rng, catalog, request);
  const furnished = placed.map((room) => ({
    ...room,
    contents: generateRoomContents(rng, catalog, room.roomType),
  }));

  const encounters = generateEncounters(rng, catalog, furnished, request.difficulty);
  const treasures = generateTreasures(rng, catalog, furnished, request.difficulty);

  const connections = buildConnections(furnished);
  const exits = exitsByRoom(connections);
  const rooms: Room[] = furnished.map((room) => ({
    ...room,
    exits: exits.get(room.id) ?? [],
  }));

  return {
    name: dungeonTitle(request.theme, request.level),
    description: themeDescription(
      catalog,
      request.theme,
      request.size,
      request.level,
    ),
    rooms,
    encounters,
    treasures,
    connections,
  };
}
