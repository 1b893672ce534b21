/**
 * Fingerprint Module
 */

export * from "./fingerprinter.js";
