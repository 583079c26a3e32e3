import { z } from "zod";
import {
  type Attack,
  type MonsterTemplate,
  RARITIES,
  ROOM_TYPES,
} from "../types/dungeon";

const NonEmptyStringList = z.tuple([z.string().min(1)], z.string().min(1));

export const RoomTypeSchema = z.enum(ROOM_TYPES);
export const RaritySchema = z.enum(RARITIES);

export const RoomTemplateSchema = z.object({
  names: NonEmptyStringList,
  descriptions: NonEmptyStringList,
});

export const RoomTemplateCatalogSchema = z.record(
  RoomTypeSchema,
  RoomTemplateSchema,
);

export const RoomContentsSchema = z.object({
  props: z.array(z.string().min(1)),
  extra: z
    .object({
      label: z.string().min(1),
      chance: z.number().min(0).max(1),
    })
    .optional(),
});

export const RoomContentsCatalogSchema = z.record(
  RoomTypeSchema,
  RoomContentsSchema,
);

const AttackSchema = z.object({
  name: z.string().min(1),
  damage: z.string().regex(/^\d+d\d+([+-]\d+)?$/, {
    error: "Damage must be a dice expression like 1d6+1",
  }),
  attackBonus: z.number().int(),
  range: z.string().min(1),
}) satisfies z.ZodType<Attack>;

export const MonsterTemplateSchema = z.object({
  name: z.string().min(1),
  monsterType: z.string().min(1),
  level: z.number().int().min(1),
  hitPoints: z.number().int().positive(),
  armorClass: z.number().int(),
  attacks: z.array(AttackSchema),
  specialAbilities: z.array(z.string()),
  lootTable: z.array(z.string()),
}) satisfies z.ZodType<MonsterTemplate>;

export const MonsterCatalogSchema = z
  .object({
    /** Template used when no monster fits the difficulty */
    baseMonster: z.string().min(1),
    monsters: z.record(z.string(), MonsterTemplateSchema),
  })
  .superRefine((data, ctx) => {
    if (!Object.hasOwn(data.monsters, data.baseMonster)) {
      ctx.addIssue({
        code: "custom",
        message: `Base monster "${data.baseMonster}" is not in the catalog`,
        path: ["baseMonster"],
      });
    }
  });

export const TreasureTemplateSchema = z.object({
  items: NonEmptyStringList,
  goldRange: z
    .tuple([z.number().int().min(0), z.number().int().min(0)])
    .refine(([min, max]) => min <= max, {
      message: "Minimum gold must be ≤ maximum gold",
    }),
});

export const TreasureCatalogSchema = z.record(
  RaritySchema,
  TreasureTemplateSchema,
);

export const ThemeCatalogSchema = z.object({
  /** Appended to every room description of the theme */
  suffixes: z.record(z.string(), z.string()),
  /** Dungeon blurbs; `{size}` and `{level}` are substituted */
  descriptions: z.record(z.string(), z.string()),
  fallbackDescription: z.string().min(1),
});

export const LocationCatalogSchema = z.object({
  environments: z.record(z.string(), NonEmptyStringList),
  fallback: NonEmptyStringList,
});

export type RoomTemplate = z.infer<typeof RoomTemplateSchema>;
export type RoomTemplateCatalog = z.infer<typeof RoomTemplateCatalogSchema>;
export type RoomContents = z.infer<typeof RoomContentsSchema>;
export type RoomContentsCatalog = z.infer<typeof RoomContentsCatalogSchema>;
export type MonsterCatalog = z.infer<typeof MonsterCatalogSchema>;
export type TreasureTemplate = z.infer<typeof TreasureTemplateSchema>;
export type TreasureCatalog = z.infer<typeof TreasureCatalogSchema>;
export type ThemeCatalog = z.infer<typeof ThemeCatalogSchema>;
export type LocationCatalog = z.infer<typeof LocationCatalogSchema>;
