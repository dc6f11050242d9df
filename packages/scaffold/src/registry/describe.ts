/**
 * One-line summaries of registries and bindings for logs and test output
 */

import {
  formatConstant,
  formatElementMatcher,
  formatLatentMatcher,
} from "@classforge/description";
import { formatAttributeAppender } from "../attribute/appender.js";
import { formatAttributeAppenderFactory } from "../attribute/factory.js";
import { formatFieldTransformer } from "../transform/field-transformer.js";
import type { FieldBindingRecord } from "./binding-record.js";
import type { CompiledFieldRegistry } from "./compiled-registry.js";
import { fieldRules, type FieldRegistry } from "./field-registry.js";

export const describeFieldRegistry = (registry: FieldRegistry): string => {
  const rules = fieldRules(registry).map(
    (rule) =>
      `{matcher=${formatLatentMatcher(rule.matcher)}, appender=${formatAttributeAppenderFactory(rule.attributeAppenderFactory)}, default=${formatConstant(rule.defaultValue)}, transformer=${formatFieldTransformer(rule.transformer)}}`
  );
  return `FieldRegistry[${rules.join(", ")}]`;
};

export const describeCompiledFieldRegistry = (
  compiled: CompiledFieldRegistry
): string => {
  if (compiled.kind === "noOp") {
    return "CompiledFieldRegistry.noOp";
  }
  const entries = compiled.entries.map(
    (entry) =>
      `{matcher=${formatElementMatcher(entry.matcher)}, appender=${formatAttributeAppender(entry.attributeAppender)}, default=${formatConstant(entry.defaultValue)}, transformer=${formatFieldTransformer(entry.transformer)}}`
  );
  return `CompiledFieldRegistry(${compiled.instrumentedType.name})[${entries.join(", ")}]`;
};

export const describeFieldBinding = (record: FieldBindingRecord): string =>
  record.kind === "explicitField"
    ? `explicit(${record.field.name}, appender=${formatAttributeAppender(record.attributeAppender)}, default=${formatConstant(record.defaultValue)})`
    : `implicit(${record.field.name})`;
