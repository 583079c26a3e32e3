/**
 * Encounter Generation
 *
 * Rolls monster encounters for rooms that can hold them. Every enemy is a
 * deep copy of its catalog template.
 */

import {
  choice,
  type Encounter,
  type Enemy,
  probability,
  range,
  type RoomType,
} from "@cryptforge/contracts";
import { baseMonster, type Catalog, monsterTemplates } from "../../catalog";
import {
  ENCOUNTER_CHANCE,
  ENCOUNTER_ROOM_TYPES,
  ENEMY_LEVEL_ALLOWANCE,
  MAX_ROOM_ENEMIES,
  ROOM_AMBUSH_CHANCE,
} from "../../core/constants";

/**
 * Anything carrying a room id and type.
 */
export interface RoomSite {
  readonly id: number;
  readonly roomType: RoomType;
}

/**
 * Pick a monster for a difficulty.
 *
 * Draws uniformly among templates at most {@link ENEMY_LEVEL_ALLOWANCE}
 * levels above `difficulty`; when none qualifies, returns the catalog's base
 * monster without drawing.
 */
export function selectEnemy(
  rng: () => number,
  catalog: Catalog,
  difficulty: number,
): Enemy {
  const available = monsterTemplates(catalog).filter(
    (monster) => monster.level <= difficulty + ENEMY_LEVEL_ALLOWANCE,
  );
  const template = choice(rng, available) ?? baseMonster(catalog);
  return structuredClone(template);
}

/**
 * Roll `count` enemies, each with its own draw.
 */
export function selectEnemies(
  rng: () => number,
  catalog: Catalog,
  difficulty: number,
  count: number,
): Enemy[] {
  const enemies: Enemy[] = [];
  for (let i = 0; i < count; i++) {
    enemies.push(selectEnemy(rng, catalog, difficulty));
  }
  return enemies;
}

export function createEncounter(
  rng: () => number,
  catalog: Catalog,
  roomId: number,
  difficulty: number,
): Encounter {
  const count = range(rng, 1, Math.max(1, Math.min(MAX_ROOM_ENEMIES, difficulty)));
  const enemies = selectEnemies(rng, catalog, difficulty, count);

  return {
    roomId,
    enemies,
    difficulty,
    isAmbush: probability(rng, ROOM_AMBUSH_CHANCE),
  };
}

/**
 * At most one encounter per eligible room, in room order.
 */
export function generateEncounters(
  rng: () => number,
  catalog: Catalog,
  rooms: readonly RoomSite[],
  difficulty: number,
): Encounter[] {
  const encounters: Encounter[] = [];

  for (const room of rooms) {
    if (!ENCOUNTER_ROOM_TYPES.has(room.roomType)) continue;
    if (!probability(rng, ENCOUNTER_CHANCE)) continue;
    encounters.push(createEncounter(rng, catalog, room.id, difficulty));
  }

  return encounters;
}
