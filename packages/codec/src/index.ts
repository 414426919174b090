export * from "./ContentCache.js";
export * from "./Fingerprint.js";
export * from "./Logging.js";
export * from "./Lookup.js";
export * from "./Mappings.js";
export * from "./SourceMap.js";
export * from "./StringTable.js";
export * from "./Vlq.js";
