/**
 * Proximity Connectivity
 *
 * Rooms on neighbouring grid cells (orthogonal or diagonal) are connected.
 * Each neighbour pair yields two directed connections with opposite
 * directions; exits are the outgoing connections of each room.
 */

import type { Connection, RoomExit } from "@cryptforge/contracts";
import { CONNECTION_RADIUS } from "../../core/constants";
import { compassDirection, euclideanDistance, type Point } from "../../core/geometry";

export interface ConnectableRoom extends Point {
  readonly id: number;
}

function connectionKey(connection: Connection): string {
  return `${connection.fromRoomId}:${connection.toRoomId}:${connection.direction}`;
}

/**
 * Directed connections for every ordered pair of distinct rooms within
 * {@link CONNECTION_RADIUS}, in room order. Duplicate triples are dropped.
 */
export function buildConnections(
  rooms: readonly ConnectableRoom[],
): Connection[] {
  const connections: Connection[] = [];
  const seen = new Set<string>();

  for (const room of rooms) {
    for (const other of rooms) {
      if (room === other) continue;
      if (euclideanDistance(room, other) > CONNECTION_RADIUS) continue;

      const connection: Connection = {
        fromRoomId: room.id,
        toRoomId: other.id,
        direction: compassDirection(room, other),
      };
      const key = connectionKey(connection);
      if (seen.has(key)) continue;

      seen.add(key);
      connections.push(connection);
    }
  }

  return connections;
}

/**
 * Outgoing exits per room id, in connection order.
 */
export function exitsByRoom(
  connections: readonly Connection[],
): Map<number, RoomExit[]> {
  const exits = new Map<number, RoomExit[]>();
  for (const connection of connections) {
    const list = exits.get(connection.fromRoomId) ?? [];
    list.push({
      direction: connection.direction,
      destinationRoomId: connection.toRoomId,
    });
    exits.set(connection.fromRoomId, list);
  }
  return exits;
}
