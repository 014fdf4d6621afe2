/**
 * Utils Index
 * Central export point for all utility functions
 */

// Response formatters
export * from "./responseFormatter.js";
