export * from "./LogCatcher.js";
export * from "./TestMappings.js";
