/**
 * Treasure Generation
 *
 * Treasuries and boss lairs always hold a rare hoard. Other rooms roll for a
 * common or uncommon cache.
 */

import {
  probability,
  type Rarity,
  range,
  sample,
  type Treasure,
} from "@cryptforge/contracts";
import type { Catalog } from "../../catalog";
import {
  COMMON_TREASURE_CHANCE,
  GUARANTEED_RARITY,
  HIDDEN_TREASURE_CHANCE,
  MAX_TRAP_DIFFICULTY,
  MAX_TREASURE_ITEMS,
  TRAPPED_TREASURE_CHANCE,
  TREASURE_CHANCE,
  TREASURE_ROOM_TYPES,
} from "../../core/constants";
import type { RoomSite } from "./encounters";

export function createTreasure(
  rng: () => number,
  catalog: Catalog,
  roomId: number,
  difficulty: number,
  rarity: Rarity,
): Treasure {
  const template = catalog.treasures[rarity];

  const itemCount = range(rng, 1, MAX_TREASURE_ITEMS);
  const items = sample(rng, template.items, itemCount);

  const [minGold, maxGold] = template.goldRange;
  const gold = range(rng, minGold, maxGold) * difficulty;

  const isHidden = probability(rng, HIDDEN_TREASURE_CHANCE);
  const trapDifficulty = probability(rng, TRAPPED_TREASURE_CHANCE)
    ? range(rng, 1, MAX_TRAP_DIFFICULTY)
    : 0;

  return { roomId, items, gold, isHidden, trapDifficulty };
}

/**
 * At most one treasure per room, in room order.
 */
export function generateTreasures(
  rng: () => number,
  catalog: Catalog,
  rooms: readonly RoomSite[],
  difficulty: number,
): Treasure[] {
  const treasures: Treasure[] = [];

  for (const room of rooms) {
    if (TREASURE_ROOM_TYPES.has(room.roomType)) {
      treasures.push(
        createTreasure(rng, catalog, room.id, difficulty, GUARANTEED_RARITY),
      );
    } else if (probability(rng, TREASURE_CHANCE)) {
      const rarity: Rarity = probability(rng, COMMON_TREASURE_CHANCE)
        ? "common"
        : "uncommon";
      treasures.push(createTreasure(rng, catalog, room.id, difficulty, rarity));
    }
  }

  return treasures;
}
