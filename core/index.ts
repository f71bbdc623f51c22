/**
 * Core module exports for consensus-explain.
 */

export * from "./config.ts";
export * from "./config-loader.ts";
export * from "./registry/index.ts";
export * from "./run/index.ts";
export * from "./consensus/index.ts";
export * from "./analysis/index.ts";

// Explanations - per-family score breakdowns
export * from "./explanation/index.ts";
