import {
  type AdHocEncounter,
  type EncounterRequest,
  probability,
  range,
} from "@cryptforge/contracts";
import { type Catalog, locationEnvironment } from "../catalog";
import { AD_HOC_AMBUSH_CHANCE, MAX_AD_HOC_ENEMIES } from "../core/constants";
import { selectEnemies } from "../passes/content/encounters";

/**
 * Larger parties face lower-level monsters, but never below level 1.
 */
export function adjustDifficulty(difficulty: number, partySize: number): number {
  return Math.max(1, difficulty - (partySize - 1));
}

/**
 * A standalone encounter for a party at a location.
 */
export function assembleEncounter(
  rng: () => number,
  catalog: Catalog,
  request: EncounterRequest,
): AdHocEncounter {
  const adjustedDifficulty = adjustDifficulty(
    request.difficulty,
    request.partySize,
  );
  const maxEnemies = Math.max(
    1,
    Math.min(request.partySize + 1, MAX_AD_HOC_ENEMIES),
  );
  const enemies = selectEnemies(
    rng,
    catalog,
    adjustedDifficulty,
    range(rng, 1, maxEnemies),
  );

  return {
    location: request.location,
    difficulty: request.difficulty,
    adjustedDifficulty,
    enemies,
    environment: locationEnvironment(catalog, request.location),
    isAmbush: probability(rng, AD_HOC_AMBUSH_CHANCE),
  };
}
