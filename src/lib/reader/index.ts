/**
 * Reader module - line-delimited JSON input
 */

export * from "./ndjson-reader.js";
