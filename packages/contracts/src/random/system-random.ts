import { randomBytes } from "node:crypto";
import { SeededRandom } from "./seeded-random";

/**
 * Unsigned 32-bit integer from the system entropy pool.
 */
export function randomUint32(): number {
  return randomBytes(4).readUInt32LE(0);
}

/**
 * Fresh, unpredictable random source for a single request.
 */
export function createSystemRandom(): SeededRandom {
  return new SeededRandom(randomUint32());
}
