/**
 * classforge description model - types, fields, annotations and matchers
 */

export * from "./types/result.js";
export * from "./types/diagnostic.js";
export * from "./types/constant.js";
export * from "./types/annotation.js";
export * from "./types/type-reference.js";
export * from "./types/field.js";
export * from "./types/type-description.js";
export * from "./matchers/element-matcher.js";
export * from "./matchers/latent-matcher.js";
