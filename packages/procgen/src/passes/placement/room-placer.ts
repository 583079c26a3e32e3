/**
 * Room Placement
 *
 * Picks a room count from the size band, puts the entrance at the origin,
 * then grows the layout one room at a time: each new room gets a weighted
 * room type and a free grid cell next to a random existing room.
 */

import {
  choice,
  range,
  type RoomType,
  weightedChoice,
} from "@cryptforge/contracts";
import { type Catalog, themeSuffix } from "../../catalog";
import {
  BOSS_LEVEL_THRESHOLD,
  DEFAULT_SIZE_BAND,
  FALLBACK_MAX_ATTEMPTS,
  FALLBACK_RADIUS,
  LOW_LEVEL_ROOM_TYPE_WEIGHTS,
  LOW_LEVEL_THRESHOLD,
  PLACEMENT_MAX_ATTEMPTS,
  ROOM_TYPE_WEIGHTS,
  SIZE_BANDS,
} from "../../core/constants";
import { AXIS_OFFSETS, type Point, pointKey } from "../../core/geometry";

/**
 * A positioned room before contents and exits are attached.
 */
export interface PlacedRoom extends Point {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly roomType: RoomType;
}

export interface RoomPlacementConfig {
  readonly size: string;
  readonly level: number;
  readonly theme: string;
}

/**
 * Inclusive room-count band for a size class (case-insensitive).
 */
export function sizeBand(size: string): readonly [number, number] {
  const key = size.toLowerCase();
  return Object.hasOwn(SIZE_BANDS, key)
    ? (SIZE_BANDS[key] ?? DEFAULT_SIZE_BAND)
    : DEFAULT_SIZE_BAND;
}

export function rollRoomCount(rng: () => number, size: string): number {
  const [min, max] = sizeBand(size);
  return range(rng, min, max);
}

/**
 * Room type for the room at `index` out of `total`.
 * The last room is forced; every other room draws from the weight table.
 */
export function selectRoomType(
  rng: () => number,
  index: number,
  total: number,
  level: number,
): RoomType {
  if (index === total - 1) {
    return level >= BOSS_LEVEL_THRESHOLD ? "boss" : "treasury";
  }

  const weights =
    level < LOW_LEVEL_THRESHOLD ? LOW_LEVEL_ROOM_TYPE_WEIGHTS : ROOM_TYPE_WEIGHTS;
  return weightedChoice(rng, weights) ?? "corridor";
}

/**
 * First free cell on the square rings around the origin, innermost first.
 */
function scanForFreeCell(occupied: ReadonlySet<string>): Point {
  for (let radius = 0; ; radius++) {
    for (let x = -radius; x <= radius; x++) {
      for (let y = -radius; y <= radius; y++) {
        if (Math.max(Math.abs(x), Math.abs(y)) !== radius) continue;
        const cell = { x, y };
        if (!occupied.has(pointKey(cell))) return cell;
      }
    }
  }
}

/**
 * Find a free cell for a new room.
 *
 * Tries up to {@link PLACEMENT_MAX_ATTEMPTS} cells one step (orthogonal or
 * diagonal) from a random existing room. After that, draws uniformly from
 * the fallback square, still rejecting occupied cells, and finally scans
 * outward from the origin. The returned cell is never occupied.
 */
export function findRoomPosition(
  rng: () => number,
  existing: readonly Point[],
): Point {
  const occupied = new Set(existing.map(pointKey));

  for (let attempt = 0; attempt < PLACEMENT_MAX_ATTEMPTS; attempt++) {
    const anchor = choice(rng, existing);
    if (!anchor) return { x: 0, y: 0 };

    const candidate = {
      x: anchor.x + choice(rng, AXIS_OFFSETS),
      y: anchor.y + choice(rng, AXIS_OFFSETS),
    };
    if (!occupied.has(pointKey(candidate))) return candidate;
  }

  for (let attempt = 0; attempt < FALLBACK_MAX_ATTEMPTS; attempt++) {
    const candidate = {
      x: range(rng, -FALLBACK_RADIUS, FALLBACK_RADIUS),
      y: range(rng, -FALLBACK_RADIUS, FALLBACK_RADIUS),
    };
    if (!occupied.has(pointKey(candidate))) return candidate;
  }

  return scanForFreeCell(occupied);
}

function createRoom(
  rng: () => number,
  catalog: Catalog,
  id: number,
  roomType: RoomType,
  theme: string,
  position: Point,
): PlacedRoom {
  const template = catalog.rooms[roomType];
  return {
    id,
    name: choice(rng, template.names),
    description: choice(rng, template.descriptions) + themeSuffix(catalog, theme),
    roomType,
    x: position.x,
    y: position.y,
  };
}

/**
 * Lay out every room of a dungeon. Ids run 0..N-1 in placement order and
 * room 0 is always the entrance at (0, 0).
 */
export function placeRooms(
  rng: () => number,
  catalog: Catalog,
  config: RoomPlacementConfig,
): PlacedRoom[] {
  const total = rollRoomCount(rng, config.size);
  const rooms: PlacedRoom[] = [
    createRoom(rng, catalog, 0, "entrance", config.theme, { x: 0, y: 0 }),
  ];

  for (let index = 1; index < total; index++) {
    const roomType = selectRoomType(rng, index, total, config.level);
    const position = findRoomPosition(rng, rooms);
    rooms.push(
      createRoom(rng, catalog, index, roomType, config.theme, position),
    );
  }

  return rooms;
}
