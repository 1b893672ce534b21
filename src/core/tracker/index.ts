/**
 * Tracker Module
 *
 * Remote tracker contract, the OpenProject client and the per-run cache.
 */

export * from "./models/tracker-models.js";
export * from "./interfaces/ITrackerClient.js";
export { OpenProjectClient, parseRetryAfter, type OpenProjectClientOptions } from "./impl/OpenProjectClient.js";
export { RunCache } from "./impl/run-cache.js";
