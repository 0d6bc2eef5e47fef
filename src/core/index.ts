export * from "./types.js";
export * from "./heap.js";
export * from "./priorityDict.js";
export * from "./errors.js";
export * from "./config.js";
export { naturalCompare, defaultHashKey } from "./validation.js";
export * from "./impl/index.js";
