export * from "./CacheCell.js";
export * from "./Compose.js";
export * from "./Composed.js";
export * from "./Queries.js";
export * from "./Source.js";
export * from "./SourceDebug.js";
export { spliceText } from "./Slicer.js";
