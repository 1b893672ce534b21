/**
 * Source Module
 *
 * Work-order rows in, product → project routing.
 */

export * from "./interfaces/ISourceReader.js";
export { JsonFileSourceReader, type JsonFileSourceReaderOptions } from "./impl/JsonFileSourceReader.js";
export { ProductRegistry, normalizeProduct } from "./impl/ProductRegistry.js";
