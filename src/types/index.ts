// Core re-exports for the shapecast type system
// Module types come from each module's index

export * from "./json.js";
export * from "../cli/config/types.js";
