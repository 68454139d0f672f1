export * from "./errors.js";
export * from "./schemas/bitvector.js";
export * from "./validate.js";
