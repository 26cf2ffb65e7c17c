export * from "./attribute-path.js";
export * from "./diagnostics.js";
export * from "./identity.js";
export * from "./json.js";
export * from "./schema.js";
export * from "./value.js";
