/**
 * Plan Module
 *
 * Source rows → logical orders → desired-state plans.
 */

export * from "./models/plan.js";
export * from "./models/fields.js";
export * from "./models/field-definitions.js";
export * from "./impl/field-catalog.js";
export * from "./impl/normalize.js";
export * from "./impl/grouping.js";
export * from "./impl/plan-compiler.js";
