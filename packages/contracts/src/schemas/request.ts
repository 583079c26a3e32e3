import { z } from "zod";

const IntegerField = (name: string) =>
  z.number({ error: `${name} must be a number` }).int({
    error: `${name} must be an integer`,
  });

/**
 * Theme, size and location are free-form: unknown values resolve to default
 * templates inside the engine rather than being rejected here.
 */
export const DungeonRequestSchema = z.object({
  level: IntegerField("Level"),
  theme: z.string({ error: "Theme must be a string" }),
  size: z.string({ error: "Size must be a string" }),
  difficulty: IntegerField("Difficulty"),
});

export const EncounterRequestSchema = z.object({
  difficulty: IntegerField("Difficulty").default(1),
  location: z.string({ error: "Location must be a string" }).default("forest"),
  partySize: IntegerField("Party size").default(1),
});

export type DungeonRequest = z.infer<typeof DungeonRequestSchema>;
export type EncounterRequest = z.output<typeof EncounterRequestSchema>;
