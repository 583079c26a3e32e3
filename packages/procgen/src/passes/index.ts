export * from "./connectivity/proximity";
export * from "./content";
export * from "./placement/room-placer";
