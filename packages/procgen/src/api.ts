/**
 * Generation API
 *
 * High-level entry points for dungeons and standalone encounters.
 */

import {
  type AdHocEncounter,
  createSystemRandom,
  type Dungeon,
  type DungeonRequest,
  type EncounterRequest,
  type RandomSource,
} from "@cryptforge/contracts";
import { CATALOG, type Catalog } from "./catalog";
import { bindRandom } from "./core/random";
import { assembleDungeon } from "./generators/dungeon-generator";
import { assembleEncounter } from "./generators/encounter-generator";

/**
 * Generation options
 */
export interface GenerateOptions {
  /**
   * Random source for this call.
   * Default: a fresh generator seeded from the system entropy pool
   */
  readonly random?: RandomSource;
  /**
   * Reference data to draw from.
   * Default: the bundled catalog
   */
  readonly catalog?: Catalog;
}

/**
 * Generate a complete dungeon.
 *
 * Every call draws from its own random source, so concurrent calls share no
 * state. Unknown themes and sizes fall back to defaults; this never throws
 * for integer and string inputs.
 *
 * @example
 * ```typescript
 * const dungeon = generateDungeon({
 *   level: 3,
 *   theme: "crypt",
 *   size: "medium",
 *   difficulty: 2,
 * });
 * console.log(`${dungeon.name}: ${dungeon.rooms.length} rooms`);
 * ```
 */
export function generateDungeon(
  request: DungeonRequest,
  options: GenerateOptions = {},
): Dungeon {
  const { random = createSystemRandom(), catalog = CATALOG } = options;
  return assembleDungeon(bindRandom(random), catalog, request);
}

/**
 * Generate an encounter outside of any dungeon, scaled to the party size.
 *
 * @example
 * ```typescript
 * const encounter = generateEncounter({ difficulty: 3, location: "cave", partySize: 2 });
 * ```
 */
export function generateEncounter(
  request: EncounterRequest,
  options: GenerateOptions = {},
): AdHocEncounter {
  const { random = createSystemRandom(), catalog = CATALOG } = options;
  return assembleEncounter(bindRandom(random), catalog, request);
}
