export * from "./index-mapping/index.js";
