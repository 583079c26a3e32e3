#!/usr/bin/env tsx
/**
 * Dungeon Preview Script
 *
 * Usage:
 *   npx tsx scripts/preview.ts [options]
 *
 * Options:
 *   --level <n>        Character level (default: 1)
 *   --theme <name>     Theme: crypt, tower, cave, temple, mansion (default: crypt)
 *   --size <name>      Size: small, medium, large, huge (default: small)
 *   --difficulty <n>   Encounter difficulty (default: 1)
 *   --no-color         Disable ANSI colors
 *   --help             Show this help
 *
 * Examples:
 *   npx tsx scripts/preview.ts --theme tower --size medium --level 4
 *   npx tsx scripts/preview.ts --size huge --difficulty 3 --no-color
 */

import { buildDungeonRequest, type Dungeon } from "@cryptforge/contracts";
import { generateDungeon, renderDungeonMap, renderMapLegend } from "../src";

// =============================================================================
// CLI PARSING
// =============================================================================

interface Options {
  level: string;
  theme: string;
  size: string;
  difficulty: string;
  color: boolean;
  help: boolean;
}

function parseArgs(args: readonly string[]): Options {
  const options: Options = {
    level: "1",
    theme: "crypt",
    size: "small",
    difficulty: "1",
    color: true,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1] ?? "";

    switch (arg) {
      case "--level":
      case "-l":
        options.level = next;
        i++;
        break;
      case "--theme":
      case "-t":
        options.theme = next;
        i++;
        break;
      case "--size":
      case "-s":
        options.size = next;
        i++;
        break;
      case "--difficulty":
      case "-d":
        options.difficulty = next;
        i++;
        break;
      case "--no-color":
        options.color = false;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        console.warn(`Ignoring unknown argument: ${arg}`);
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Dungeon Preview Script

Usage:
  npx tsx scripts/preview.ts [options]

Options:
  --level, -l <n>        Character level (default: 1)
  --theme, -t <name>     Theme: crypt, tower, cave, temple, mansion (default: crypt)
  --size, -s <name>      Size: small, medium, large, huge (default: small)
  --difficulty, -d <n>   Encounter difficulty (default: 1)
  --no-color             Disable ANSI colors
  --help, -h             Show this help
`);
}

// =============================================================================
// OUTPUT
// =============================================================================

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

function c(color: keyof typeof colors, text: string, enabled: boolean): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

function printSummary(dungeon: Dungeon, color: boolean): void {
  const encounterRooms = new Map(
    dungeon.encounters.map((encounter) => [encounter.roomId, encounter]),
  );
  const treasureRooms = new Map(
    dungeon.treasures.map((treasure) => [treasure.roomId, treasure]),
  );

  for (const room of dungeon.rooms) {
    const exits = room.exits.map((exit) => exit.direction).join(", ") || "none";
    console.log(
      `${c("bold", `#${room.id}`, color)} ${room.name} ${c("dim", `(${room.roomType} @ ${room.x},${room.y})`, color)}`,
    );
    console.log(`    exits: ${exits}`);

    const encounter = encounterRooms.get(room.id);
    if (encounter) {
      const names = encounter.enemies.map((enemy) => enemy.name).join(", ");
      const ambush = encounter.isAmbush ? " [ambush]" : "";
      console.log(`    ${c("cyan", "enemies:", color)} ${names}${ambush}`);
    }

    const treasure = treasureRooms.get(room.id);
    if (treasure) {
      const flags = [
        treasure.isHidden ? "hidden" : "",
        treasure.trapDifficulty > 0 ? `trap ${treasure.trapDifficulty}` : "",
      ].filter(Boolean);
      const suffix = flags.length > 0 ? ` [${flags.join(", ")}]` : "";
      console.log(
        `    ${c("yellow", "treasure:", color)} ${treasure.gold} gold, ${treasure.items.join(", ")}${suffix}`,
      );
    }
  }
}

// =============================================================================
// MAIN
// =============================================================================

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    showHelp();
    return;
  }

  const request = buildDungeonRequest({
    level: Number(options.level),
    theme: options.theme,
    size: options.size,
    difficulty: Number(options.difficulty),
  });

  if (request.isErr()) {
    console.error(`[Preview] ${request.error.message}`);
    console.error(JSON.stringify(request.error.details, null, 2));
    process.exitCode = 1;
    return;
  }

  const dungeon = generateDungeon(request.value);

  console.log(c("bold", dungeon.name, options.color));
  console.log(dungeon.description);
  console.log();
  console.log(renderDungeonMap(dungeon, { useColors: options.color }));
  console.log();
  console.log(c("dim", renderMapLegend(), options.color));
  console.log();
  printSummary(dungeon, options.color);
  console.log();
  console.log(
    `${dungeon.rooms.length} rooms, ${dungeon.connections.length} connections, ${dungeon.encounters.length} encounters, ${dungeon.treasures.length} treasures`,
  );
}

main();
