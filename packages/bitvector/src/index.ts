export { inverseLinearIndex, linearIndex } from "@bitgrid/utils";

export * from "./bitvector.js";
export * from "./config.js";
export * from "./contract.js";
