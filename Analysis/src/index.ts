export * from "./duration.js";
export * from "./segments.js";
export * from "./simplify.js";
export * from "./split.js";
export * from "./transitions.js";
export * from "./directions.js";
export * from "./analysis.js";
export * from "./config.js";
export * from "./csv.js";
export * from "./stages.js";
