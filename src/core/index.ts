/**
 * Core module - Shared functionality between the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./plan/index.js";
export * from "./fingerprint/index.js";
export * from "./identity/index.js";
export * from "./validation/index.js";
export * from "./diff/index.js";
export * from "./tracker/index.js";
export * from "./reconciliation/index.js";
export * from "./source/index.js";
export * from "./pipeline/index.js";
export * from "./config/index.js";

// Re-export types
export * from "../types/result.js";
