/**
 * Validation Module
 */

export * from "./validator.js";
