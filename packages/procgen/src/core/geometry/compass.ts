import type { Direction } from "@cryptforge/contracts";
import type { Point } from "./types";

const OPPOSITE: Readonly<Record<Direction, Direction>> = {
  north: "south",
  northeast: "southwest",
  east: "west",
  southeast: "northwest",
  south: "north",
  southwest: "northeast",
  west: "east",
  northwest: "southeast",
};

/**
 * Compass direction of the step from `from` to `to`, by the sign of each
 * axis delta. Axis-aligned deltas give the cardinal points, the rest the
 * diagonals. A zero delta has no direction and reads as "southwest".
 */
export function compassDirection(from: Point, to: Point): Direction {
  const dx = Math.sign(to.x - from.x);
  const dy = Math.sign(to.y - from.y);

  if (dy === 0) {
    if (dx > 0) return "east";
    if (dx < 0) return "west";
  }
  if (dx === 0) {
    if (dy > 0) return "north";
    if (dy < 0) return "south";
  }
  if (dx > 0) return dy > 0 ? "northeast" : "southeast";
  if (dx < 0 && dy > 0) return "northwest";
  return "southwest";
}

export function oppositeDirection(direction: Direction): Direction {
  return OPPOSITE[direction];
}
