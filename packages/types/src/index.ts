export type * from "./bitvector.js";
export type * from "./config.js";
export * from "./enum.js";
export type * from "./logger.js";
