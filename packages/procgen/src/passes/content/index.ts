export * from "./encounters";
export * from "./room-contents";
export * from "./treasures";
