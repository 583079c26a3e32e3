/**
 * Core Constants
 *
 * Named constants for the numbers that shape generation.
 */

import type { Rarity, RoomType, WeightTable } from "@cryptforge/contracts";

// =============================================================================
// ROOM COUNT
// =============================================================================

/** Inclusive room-count range per size class */
export const SIZE_BANDS: Readonly<Record<string, readonly [number, number]>> = {
  small: [3, 6],
  medium: [7, 12],
  large: [13, 20],
  huge: [21, 35],
};

/** Range used for sizes outside {@link SIZE_BANDS} */
export const DEFAULT_SIZE_BAND: readonly [number, number] = [5, 10];

// =============================================================================
// ROOM TYPES
// =============================================================================

/** Room-type weights for every room except the entrance and the last one */
export const ROOM_TYPE_WEIGHTS: WeightTable<RoomType> = [
  ["corridor", 0.4],
  ["chamber", 0.3],
  ["trap", 0.1],
  ["treasury", 0.1],
  ["boss", 0.1],
];

/**
 * Weights below level 2: fewer traps, no bosses. Deliberately left
 * unnormalized (sums to 0.85); draws scale to the table's total.
 */
export const LOW_LEVEL_ROOM_TYPE_WEIGHTS: WeightTable<RoomType> = [
  ["corridor", 0.4],
  ["chamber", 0.3],
  ["trap", 0.05],
  ["treasury", 0.1],
  ["boss", 0.0],
];

/** Levels below this use {@link LOW_LEVEL_ROOM_TYPE_WEIGHTS} */
export const LOW_LEVEL_THRESHOLD = 2;

/** From this level on the final room is a boss lair instead of a treasury */
export const BOSS_LEVEL_THRESHOLD = 3;

// =============================================================================
// PLACEMENT
// =============================================================================

/** Anchored placement attempts before falling back to a random cell */
export const PLACEMENT_MAX_ATTEMPTS = 100;

/** Random fallback cells are drawn from [-radius, radius] on both axes */
export const FALLBACK_RADIUS = 10;

/** Random fallback draws before scanning outward for a free cell */
export const FALLBACK_MAX_ATTEMPTS = 100;

// =============================================================================
// CONNECTIVITY
// =============================================================================

/** Rooms at most this far apart are connected (covers diagonals) */
export const CONNECTION_RADIUS = 1.5;

// =============================================================================
// ENCOUNTERS
// =============================================================================

export const ENCOUNTER_ROOM_TYPES: ReadonlySet<RoomType> = new Set<RoomType>([
  "chamber",
  "boss",
  "treasury",
]);

export const ENCOUNTER_CHANCE = 0.6;
export const MAX_ROOM_ENEMIES = 3;
export const ROOM_AMBUSH_CHANCE = 0.2;

/** Enemies may be at most this many levels above the difficulty */
export const ENEMY_LEVEL_ALLOWANCE = 1;

export const MAX_AD_HOC_ENEMIES = 4;
export const AD_HOC_AMBUSH_CHANCE = 0.3;

// =============================================================================
// TREASURES
// =============================================================================

/** Room types that always hold a treasure of {@link GUARANTEED_RARITY} */
export const TREASURE_ROOM_TYPES: ReadonlySet<RoomType> = new Set<RoomType>([
  "treasury",
  "boss",
]);

export const GUARANTEED_RARITY: Rarity = "rare";
export const TREASURE_CHANCE = 0.3;
export const COMMON_TREASURE_CHANCE = 0.7;
export const MAX_TREASURE_ITEMS = 3;
export const HIDDEN_TREASURE_CHANCE = 0.4;
export const TRAPPED_TREASURE_CHANCE = 0.3;
export const MAX_TRAP_DIFFICULTY = 5;
