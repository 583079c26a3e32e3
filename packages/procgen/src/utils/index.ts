export * from "./ascii-map";
