export * from "./constants.js";
export * from "./types/task.js";
export type * from "./types/wire.js";
