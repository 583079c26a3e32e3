export * from "./compass";
export * from "./types";
