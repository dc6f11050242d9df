/**
 * Compiled field registry - the per-type lookup table produced by
 * compileFieldRegistry.
 *
 * Resolving a field scans the entries in priority order and stops at the
 * first match: rules are never merged, and nothing after the matching entry
 * is evaluated. Resolution only reads the registry.
 */

import {
  constantsEqual,
  elementMatchersEqual,
  matchesField,
  stableConstantKey,
  stableElementMatcherKey,
  stableTypeKey,
  typesEqual,
  type ElementMatcher,
  type FieldDefaultValue,
  type FieldDescription,
  type TypeDescription,
} from "@classforge/description";
import {
  stableAttributeAppenderKey,
  type FieldAttributeAppender,
} from "../attribute/appender.js";
import {
  fieldTransformersEqual,
  stableFieldTransformerKey,
  transformField,
  type FieldTransformer,
} from "../transform/field-transformer.js";
import type { Logger } from "../logging.js";
import {
  explicitFieldRecord,
  implicitFieldRecord,
  type FieldBindingRecord,
} from "./binding-record.js";
import { describeFieldBinding } from "./describe.js";

export type CompiledFieldRule = {
  readonly matcher: ElementMatcher;
  readonly attributeAppender: FieldAttributeAppender;
  readonly defaultValue?: FieldDefaultValue;
  readonly transformer: FieldTransformer;
};

export type CompiledFieldRegistry =
  | { readonly kind: "noOp" }
  | {
      readonly kind: "compiled";
      readonly instrumentedType: TypeDescription;
      readonly entries: readonly CompiledFieldRule[];
      /** Receives one debug line per resolved field when tracing is on */
      readonly trace?: Logger;
    };

/**
 * A compiled registry without rules for callers that never register any;
 * every field is bound implicitly.
 */
export const noOpCompiledFieldRegistry: CompiledFieldRegistry = {
  kind: "noOp",
};

const bindEntry = (
  entry: CompiledFieldRule,
  instrumentedType: TypeDescription,
  field: FieldDescription
): FieldBindingRecord =>
  explicitFieldRecord(
    entry.attributeAppender,
    entry.defaultValue,
    transformField(entry.transformer, instrumentedType, field)
  );

export const resolveFieldBinding = (
  compiled: CompiledFieldRegistry,
  field: FieldDescription
): FieldBindingRecord => {
  if (compiled.kind === "noOp") {
    return implicitFieldRecord(field);
  }

  let record: FieldBindingRecord | undefined;
  for (const entry of compiled.entries) {
    if (matchesField(entry.matcher, field)) {
      record = bindEntry(entry, compiled.instrumentedType, field);
      break;
    }
  }
  const result = record ?? implicitFieldRecord(field);

  compiled.trace?.debug(
    `${compiled.instrumentedType.name}.${field.name} -> ${describeFieldBinding(result)}`
  );
  return result;
};

const compiledFieldRulesEqual = (
  left: CompiledFieldRule,
  right: CompiledFieldRule
): boolean =>
  left === right ||
  (elementMatchersEqual(left.matcher, right.matcher) &&
    stableAttributeAppenderKey(left.attributeAppender) ===
      stableAttributeAppenderKey(right.attributeAppender) &&
    constantsEqual(left.defaultValue, right.defaultValue) &&
    fieldTransformersEqual(left.transformer, right.transformer));

/**
 * Structural equality; the trace logger is not part of a registry's value.
 */
export const compiledFieldRegistriesEqual = (
  left: CompiledFieldRegistry,
  right: CompiledFieldRegistry
): boolean => {
  if (left.kind === "noOp" || right.kind === "noOp") {
    return left.kind === right.kind;
  }
  return (
    typesEqual(left.instrumentedType, right.instrumentedType) &&
    left.entries.length === right.entries.length &&
    left.entries.every((entry, index) => {
      const other = right.entries[index];
      return other !== undefined && compiledFieldRulesEqual(entry, other);
    })
  );
};

export const stableCompiledFieldRuleKey = (rule: CompiledFieldRule): string =>
  [
    stableElementMatcherKey(rule.matcher),
    stableAttributeAppenderKey(rule.attributeAppender),
    stableConstantKey(rule.defaultValue),
    stableFieldTransformerKey(rule.transformer),
  ].join("|");

export const stableCompiledFieldRegistryKey = (
  compiled: CompiledFieldRegistry
): string =>
  compiled.kind === "noOp"
    ? "compiled:noOp"
    : `compiled:${stableTypeKey(compiled.instrumentedType)}[${compiled.entries
        .map(stableCompiledFieldRuleKey)
        .join(";")}]`;
