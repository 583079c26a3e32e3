/**
 * Cryptforge - Procedural Generation Package
 *
 * Room-graph dungeons with encounters and treasures, generated per request.
 *
 * @example
 * ```typescript
 * import { generateDungeon, renderDungeonMap } from "@cryptforge/procgen";
 *
 * const dungeon = generateDungeon({ level: 2, theme: "cave", size: "small", difficulty: 1 });
 * console.log(dungeon.name);
 * console.log(renderDungeonMap(dungeon));
 * ```
 */

// High-level API
export { type GenerateOptions, generateDungeon, generateEncounter } from "./api";
// Reference data
export {
  CATALOG,
  type Catalog,
  type CatalogSources,
  loadCatalog,
} from "./catalog";
// Core modules
export * from "./core/constants";
export * from "./core/geometry";
export { bindRandom } from "./core/random";
// Generators
export * from "./generators";
// Pass Library
export * as passes from "./passes";
// Utilities
export * from "./utils";
