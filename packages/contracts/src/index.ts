export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/source";
export * from "./random/system-random";
export * from "./random/weighted";
export * from "./schemas/catalog";
export * from "./schemas/request";
export * from "./types/dungeon";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
