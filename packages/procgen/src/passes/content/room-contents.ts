import { probability, type RoomType } from "@cryptforge/contracts";
import type { Catalog } from "../../catalog";

/**
 * Prop labels for a room of the given type. Types with an optional extra
 * prop roll for it once.
 */
export function generateRoomContents(
  rng: () => number,
  catalog: Catalog,
  roomType: RoomType,
): string[] {
  const entry = catalog.contents[roomType];
  const contents = [...entry.props];
  if (entry.extra && probability(rng, entry.extra.chance)) {
    contents.push(entry.extra.label);
  }
  return contents;
}
