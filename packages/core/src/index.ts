export * from "./errors/catalog.js";
export * from "./schemas/index.js";
export * from "./config/index.js";
export * from "./logger/index.js";
export * from "./codes/index.js";
export * from "./storage/index/index.js";
export * from "./storage/hierarchy/index.js";
export * from "./search/index.js";
export * from "./allocator/index.js";
export * from "./creation/index.js";
