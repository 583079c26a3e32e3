export const ROOM_TYPES = [
  "entrance",
  "corridor",
  "chamber",
  "treasury",
  "boss",
  "trap",
] as const;

export type RoomType = (typeof ROOM_TYPES)[number];

export const RARITIES = ["common", "uncommon", "rare"] as const;

export type Rarity = (typeof RARITIES)[number];

export const DIRECTIONS = [
  "north",
  "northeast",
  "east",
  "southeast",
  "south",
  "southwest",
  "west",
  "northwest",
] as const;

export type Direction = (typeof DIRECTIONS)[number];

export interface Attack {
  name: string;
  /** Dice expression, e.g. "1d6+1" */
  damage: string;
  attackBonus: number;
  range: string;
}

export interface MonsterTemplate {
  name: string;
  monsterType: string;
  level: number;
  hitPoints: number;
  armorClass: number;
  attacks: Attack[];
  specialAbilities: string[];
  lootTable: string[];
}

/**
 * A monster placed in an encounter. Always an independent copy of its
 * catalog template, so callers may track damage on it freely.
 */
export type Enemy = MonsterTemplate;

export interface RoomExit {
  readonly direction: Direction;
  readonly destinationRoomId: number;
}

export interface Room {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly roomType: RoomType;
  readonly contents: readonly string[];
  readonly exits: readonly RoomExit[];
  readonly x: number;
  readonly y: number;
}

export interface Encounter {
  readonly roomId: number;
  readonly enemies: Enemy[];
  readonly difficulty: number;
  readonly isAmbush: boolean;
}

export interface Treasure {
  readonly roomId: number;
  readonly items: readonly string[];
  readonly gold: number;
  readonly isHidden: boolean;
  /** 0 means untrapped */
  readonly trapDifficulty: number;
}

export interface Connection {
  readonly fromRoomId: number;
  readonly toRoomId: number;
  readonly direction: Direction;
}

export interface Dungeon {
  readonly name: string;
  readonly description: string;
  readonly rooms: readonly Room[];
  readonly encounters: readonly Encounter[];
  readonly treasures: readonly Treasure[];
  readonly connections: readonly Connection[];
}

/**
 * Encounter generated on demand, outside of any dungeon.
 */
export interface AdHocEncounter {
  readonly location: string;
  /** Difficulty as requested */
  readonly difficulty: number;
  /** Difficulty after party-size scaling, never below 1 */
  readonly adjustedDifficulty: number;
  readonly enemies: Enemy[];
  readonly environment: readonly string[];
  readonly isAmbush: boolean;
}
