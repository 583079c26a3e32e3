/**
 * Wire format
 *
 * The game client speaks snake_case; domain objects are camelCase.
 */

import type {
  AdHocEncounter,
  Attack,
  Connection,
  Direction,
  Dungeon,
  Encounter,
  Enemy,
  Room,
  RoomType,
  Treasure,
} from "@cryptforge/contracts";

export interface WireAttack {
  name: string;
  damage: string;
  attack_bonus: number;
  range: string;
}

export interface WireEnemy {
  name: string;
  monster_type: string;
  level: number;
  hit_points: number;
  armor_class: number;
  attacks: WireAttack[];
  special_abilities: string[];
  loot_table: string[];
}

/** Generated exits are never secret or locked; the flags are part of the client's exit shape. */
export interface WireExit {
  direction: Direction;
  destination_room: number;
  is_secret: boolean;
  is_locked: boolean;
}

export interface WireRoom {
  id: number;
  name: string;
  description: string;
  room_type: RoomType;
  contents: string[];
  exits: WireExit[];
  x: number;
  y: number;
}

export interface WireEncounter {
  room_id: number;
  enemies: WireEnemy[];
  difficulty: number;
  is_ambush: boolean;
}

export interface WireTreasure {
  room_id: number;
  items: string[];
  gold: number;
  is_hidden: boolean;
  trap_difficulty: number;
}

export interface WireConnection {
  from_room: number;
  to_room: number;
  direction: Direction;
}

export interface WireDungeon {
  name: string;
  description: string;
  rooms: WireRoom[];
  encounters: WireEncounter[];
  treasures: WireTreasure[];
  connections: WireConnection[];
}

export interface WireAdHocEncounter {
  location: string;
  difficulty: number;
  adjusted_difficulty: number;
  enemies: WireEnemy[];
  environment: string[];
  is_ambush: boolean;
}

const toWireAttack = (attack: Attack): WireAttack => ({
  name: attack.name,
  damage: attack.damage,
  attack_bonus: attack.attackBonus,
  range: attack.range,
});

const toWireEnemy = (enemy: Enemy): WireEnemy => ({
  name: enemy.name,
  monster_type: enemy.monsterType,
  level: enemy.level,
  hit_points: enemy.hitPoints,
  armor_class: enemy.armorClass,
  attacks: enemy.attacks.map(toWireAttack),
  special_abilities: [...enemy.specialAbilities],
  loot_table: [...enemy.lootTable],
});

const toWireRoom = (room: Room): WireRoom => ({
  id: room.id,
  name: room.name,
  description: room.description,
  room_type: room.roomType,
  contents: [...room.contents],
  exits: room.exits.map((exit) => ({
    direction: exit.direction,
    destination_room: exit.destinationRoomId,
    is_secret: false,
    is_locked: false,
  })),
  x: room.x,
  y: room.y,
});

const toWireEncounter = (encounter: Encounter): WireEncounter => ({
  room_id: encounter.roomId,
  enemies: encounter.enemies.map(toWireEnemy),
  difficulty: encounter.difficulty,
  is_ambush: encounter.isAmbush,
});

const toWireTreasure = (treasure: Treasure): WireTreasure => ({
  room_id: treasure.roomId,
  items: [...treasure.items],
  gold: treasure.gold,
  is_hidden: treasure.isHidden,
  trap_difficulty: treasure.trapDifficulty,
});

const toWireConnection = (connection: Connection): WireConnection => ({
  from_room: connection.fromRoomId,
  to_room: connection.toRoomId,
  direction: connection.direction,
});

export const toWireDungeon = (dungeon: Dungeon): WireDungeon => ({
  name: dungeon.name,
  description: dungeon.description,
  rooms: dungeon.rooms.map(toWireRoom),
  encounters: dungeon.encounters.map(toWireEncounter),
  treasures: dungeon.treasures.map(toWireTreasure),
  connections: dungeon.connections.map(toWireConnection),
});

export const toWireAdHocEncounter = (
  encounter: AdHocEncounter,
): WireAdHocEncounter => ({
  location: encounter.location,
  difficulty: encounter.difficulty,
  adjusted_difficulty: encounter.adjustedDifficulty,
  enemies: encounter.enemies.map(toWireEnemy),
  environment: [...encounter.environment],
  is_ambush: encounter.isAmbush,
});

/**
 * Rename the snake_case encounter request fields; other values pass through
 * untouched for validation.
 */
export function fromWireEncounterRequest(body: unknown): unknown {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return body;
  }
  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [
      key === "party_size" ? "partySize" : key,
      value,
    ]),
  );
}
