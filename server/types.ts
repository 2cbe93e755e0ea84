export * from "./types/contracts.js";
export * from "./types/helpers.js";
