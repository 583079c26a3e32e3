/**
 * Static Catalog
 *
 * Room, monster, treasure, theme and location reference data. Loaded from the
 * JSON files under `./data`, validated once at module load, then deep-frozen:
 * every generation run shares the same catalog and must never mutate it.
 */

import {
  DungeonError,
  type LocationCatalog,
  LocationCatalogSchema,
  type MonsterCatalog,
  MonsterCatalogSchema,
  type MonsterTemplate,
  type RoomContentsCatalog,
  RoomContentsCatalogSchema,
  type RoomTemplateCatalog,
  RoomTemplateCatalogSchema,
  type ThemeCatalog,
  ThemeCatalogSchema,
  type TreasureCatalog,
  TreasureCatalogSchema,
} from "@cryptforge/contracts";
import type { z } from "zod";
import contentsData from "./data/contents.json";
import locationsData from "./data/locations.json";
import monstersData from "./data/monsters.json";
import roomsData from "./data/rooms.json";
import themesData from "./data/themes.json";
import treasuresData from "./data/treasures.json";

export interface Catalog {
  readonly rooms: RoomTemplateCatalog;
  readonly contents: RoomContentsCatalog;
  readonly monsters: MonsterCatalog;
  readonly treasures: TreasureCatalog;
  readonly themes: ThemeCatalog;
  readonly locations: LocationCatalog;
}

/**
 * Raw, unvalidated catalog inputs keyed like {@link Catalog}.
 */
export type CatalogSources = Readonly<Record<keyof Catalog, unknown>>;

const BUNDLED_SOURCES: CatalogSources = {
  rooms: roomsData,
  contents: contentsData,
  monsters: monstersData,
  treasures: treasuresData,
  themes: themesData,
  locations: locationsData,
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function parseSection<S extends z.ZodType>(
  section: keyof Catalog,
  schema: S,
  data: unknown,
): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw DungeonError.catalogInvalid(`Catalog section "${section}" is invalid`, {
      section,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

/**
 * Validate and freeze catalog data.
 *
 * @throws {DungeonError} CATALOG_INVALID when any section fails validation
 */
export function loadCatalog(sources: CatalogSources = BUNDLED_SOURCES): Catalog {
  return deepFreeze({
    rooms: parseSection("rooms", RoomTemplateCatalogSchema, sources.rooms),
    contents: parseSection("contents", RoomContentsCatalogSchema, sources.contents),
    monsters: parseSection("monsters", MonsterCatalogSchema, sources.monsters),
    treasures: parseSection("treasures", TreasureCatalogSchema, sources.treasures),
    themes: parseSection("themes", ThemeCatalogSchema, sources.themes),
    locations: parseSection("locations", LocationCatalogSchema, sources.locations),
  });
}

/**
 * The bundled catalog, shared by every request.
 */
export const CATALOG: Catalog = loadCatalog();

/**
 * Own-property lookup on a free-form record, so keys like "constructor" miss.
 */
export function lookup<V>(
  record: Readonly<Record<string, V>>,
  key: string,
): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Suffix appended to room descriptions for a theme; empty when unknown.
 */
export function themeSuffix(catalog: Catalog, theme: string): string {
  return lookup(catalog.themes.suffixes, theme.toLowerCase()) ?? "";
}

/**
 * One-sentence dungeon blurb for a theme, with the generic fallback.
 */
export function themeDescription(
  catalog: Catalog,
  theme: string,
  size: string,
  level: number,
): string {
  const template =
    lookup(catalog.themes.descriptions, theme.toLowerCase()) ??
    catalog.themes.fallbackDescription;
  return template.replace(/\{(size|level)\}/g, (_, key: string) =>
    key === "size" ? size : String(level),
  );
}

/**
 * Monster templates in catalog order.
 */
export function monsterTemplates(catalog: Catalog): MonsterTemplate[] {
  return Object.values(catalog.monsters.monsters);
}

/**
 * Template used when no monster qualifies for a difficulty.
 */
export function baseMonster(catalog: Catalog): MonsterTemplate {
  const base = lookup(catalog.monsters.monsters, catalog.monsters.baseMonster);
  if (!base) {
    throw DungeonError.catalogInvalid(
      `Base monster "${catalog.monsters.baseMonster}" is not in the catalog`,
    );
  }
  return base;
}

/**
 * Environment flavor for an encounter location, as a fresh array.
 */
export function locationEnvironment(catalog: Catalog, location: string): string[] {
  const environment =
    lookup(catalog.locations.environments, location.toLowerCase()) ??
    catalog.locations.fallback;
  return [...environment];
}
