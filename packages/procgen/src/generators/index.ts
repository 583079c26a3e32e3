/**
 * Generators module - whole-dungeon and standalone encounter assembly.
 */

export {
  assembleDungeon,
  dungeonTitle,
  titleCase,
} from "./dungeon-generator";
export { adjustDifficulty, assembleEncounter } from "./encounter-generator";
