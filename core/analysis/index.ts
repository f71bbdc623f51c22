/**
 * Statistics helpers for score aggregation.
 */

export * from "./statistics.ts";
