import type { z } from "zod";
import {
  type DungeonRequest,
  DungeonRequestSchema,
  type EncounterRequest,
  EncounterRequestSchema,
} from "../schemas/request";
import { DungeonError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

function invalid(message: string, error: z.ZodError): DungeonError {
  return DungeonError.requestInvalid(message, {
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

/**
 * Validate an untrusted dungeon request.
 * Every field is required; numeric fields must be integers.
 */
export function buildDungeonRequest(
  input: unknown,
): Result<DungeonRequest, DungeonError> {
  const parsed = DungeonRequestSchema.safeParse(input);
  if (!parsed.success) return Err(invalid("Invalid dungeon request", parsed.error));
  return Ok(parsed.data);
}

/**
 * Validate an untrusted encounter request, filling in defaults
 * (difficulty 1, location "forest", party of 1).
 */
export function buildEncounterRequest(
  input: unknown,
): Result<EncounterRequest, DungeonError> {
  const parsed = EncounterRequestSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return Err(invalid("Invalid encounter request", parsed.error));
  }
  return Ok(parsed.data);
}
