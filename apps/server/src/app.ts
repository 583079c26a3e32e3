import { cors } from "@elysiajs/cors";
import {
  buildDungeonRequest,
  buildEncounterRequest,
  DungeonError,
  type RandomSource,
} from "@cryptforge/contracts";
import {
  generateDungeon,
  generateEncounter,
  renderDungeonMap,
} from "@cryptforge/procgen";
import { Elysia } from "elysia";
import { securityPlugin } from "./api/core/plugins/security.plugin";
import {
  fromWireEncounterRequest,
  toWireAdHocEncounter,
  toWireDungeon,
} from "./api/serialization";
import { corsOrigins, loadConfig, type ServerConfig } from "./config";

export const SERVICE_NAME = "Cryptforge Dungeon Service";
export const SERVICE_VERSION = "0.1.0";

const ENDPOINTS = [
  "/generate_dungeon",
  "/generate_encounter",
  "/dungeon/preview",
  "/health",
] as const;

type ElysiaAdapter = NonNullable<
  ConstructorParameters<typeof Elysia>[0]
>["adapter"];

export interface AppOptions {
  readonly config?: ServerConfig;
  /** Runtime adapter; the web-standard one when omitted */
  readonly adapter?: ElysiaAdapter;
  /** Random source per request; system-seeded when omitted */
  readonly random?: () => RandomSource;
}

const invalidRequest = (error: DungeonError) => ({
  ok: false as const,
  error: error.code,
  message: error.message,
  details: error.details,
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const createApp = ({
  config = loadConfig(),
  adapter,
  random,
}: AppOptions = {}) =>
  new Elysia({ adapter })
    .use(securityPlugin({ hsts: config.nodeEnv === "production" }))
    .use(
      cors({
        origin: corsOrigins(config),
        methods: ["GET", "POST", "OPTIONS"],
        allowedHeaders: ["Content-Type"],
      }),
    )
    .onError(({ code, error, request, set }) => {
      if (code === "NOT_FOUND") return;

      if (code === "PARSE") {
        set.status = 400;
        return invalidRequest(
          DungeonError.requestInvalid("Request body is not valid JSON", {
            issues: [{ path: "", message: errorMessage(error) }],
          }),
        );
      }

      const path = new URL(request.url).pathname;
      console.error(`[Server] ${request.method} ${path} failed:`, error);

      const failure = DungeonError.generationFailed(
        `Generation failed: ${errorMessage(error)}`,
      );
      set.status = 500;
      return {
        ok: false as const,
        error: failure.code,
        message: failure.message,
      };
    })
    .get("/", () => ({
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: ENDPOINTS,
    }))
    .get("/health", () => ({
      status: "healthy",
      components: ["dungeon_generator"],
    }))
    .post("/generate_dungeon", ({ body, set }) => {
      const request = buildDungeonRequest(body);
      if (request.isErr()) {
        set.status = 400;
        return invalidRequest(request.error);
      }

      const dungeon = generateDungeon(request.value, { random: random?.() });
      console.log(
        `[Dungeon] Generated "${dungeon.name}" (${request.value.size}): ${dungeon.rooms.length} rooms, ${dungeon.encounters.length} encounters, ${dungeon.treasures.length} treasures`,
      );
      return toWireDungeon(dungeon);
    })
    .post("/generate_encounter", ({ body, set }) => {
      const request = buildEncounterRequest(fromWireEncounterRequest(body));
      if (request.isErr()) {
        set.status = 400;
        return invalidRequest(request.error);
      }

      const encounter = generateEncounter(request.value, {
        random: random?.(),
      });
      console.log(
        `[Encounter] ${encounter.enemies.length} enemies at ${encounter.location} (difficulty ${encounter.adjustedDifficulty})`,
      );
      return toWireAdHocEncounter(encounter);
    })
    .get("/dungeon/preview", ({ query, set }) => {
      const request = buildDungeonRequest({
        level: query.level === undefined ? 1 : Number(query.level),
        theme: query.theme ?? "crypt",
        size: query.size ?? "small",
        difficulty:
          query.difficulty === undefined ? 1 : Number(query.difficulty),
      });
      if (request.isErr()) {
        set.status = 400;
        return invalidRequest(request.error);
      }

      const dungeon = generateDungeon(request.value, { random: random?.() });
      set.headers["content-type"] = "text/plain; charset=utf-8";
      return renderDungeonMap(dungeon);
    });

export type CryptforgeApp = ReturnType<typeof createApp>;
