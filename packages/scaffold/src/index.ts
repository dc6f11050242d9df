/**
 * classforge scaffold - field rule registry, compiler and binding records
 */

export * from "./attribute/appender.js";
export * from "./attribute/factory.js";
export * from "./transform/field-transformer.js";
export * from "./registry/field-registry.js";
export * from "./registry/compiler.js";
export * from "./registry/compiled-registry.js";
export * from "./registry/binding-record.js";
export * from "./registry/describe.js";
export * from "./logging.js";
export * from "./config.js";
