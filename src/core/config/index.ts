/**
 * Config Module
 */

export { loadConfig, loadFieldMap, resolveApiKey } from "./loader.js";
