/**
 * Field binding records - the outcome of resolving one field against a
 * compiled registry.
 *
 * - explicitField: a rule matched. Carries the rule's appender, its default
 *   value and the field as rewritten by the rule's transformer.
 * - implicitField: no rule matched. Carries the original field; it is
 *   emitted with its own annotations and no default value.
 */

import type {
  Annotation,
  FieldDefaultValue,
  FieldDescription,
  FieldModifiers,
  TypeReference,
} from "@classforge/description";
import {
  appendFieldAttributes,
  forInstrumentedFieldAppender,
  type FieldAttributeAppender,
} from "../attribute/appender.js";

export type FieldBindingRecord =
  | {
      readonly kind: "explicitField";
      readonly attributeAppender: FieldAttributeAppender;
      readonly defaultValue?: FieldDefaultValue;
      readonly field: FieldDescription;
    }
  | { readonly kind: "implicitField"; readonly field: FieldDescription };

export const explicitFieldRecord = (
  attributeAppender: FieldAttributeAppender,
  defaultValue: FieldDefaultValue | undefined,
  field: FieldDescription
): FieldBindingRecord => ({
  kind: "explicitField",
  attributeAppender,
  ...(defaultValue !== undefined ? { defaultValue } : {}),
  field,
});

export const implicitFieldRecord = (
  field: FieldDescription
): FieldBindingRecord => ({ kind: "implicitField", field });

export const isImplicitField = (record: FieldBindingRecord): boolean =>
  record.kind === "implicitField";

/**
 * The record's own default value, or `fallback` when it has none.
 */
export const resolveFieldDefault = (
  record: FieldBindingRecord,
  fallback: FieldDefaultValue | undefined
): FieldDefaultValue | undefined =>
  record.kind === "explicitField"
    ? (record.defaultValue ?? fallback)
    : fallback;

/**
 * Implicit fields keep the annotations they were declared with.
 */
export const fieldAttributeAppenderOf = (
  record: FieldBindingRecord
): FieldAttributeAppender =>
  record.kind === "explicitField"
    ? record.attributeAppender
    : forInstrumentedFieldAppender;

/**
 * What the emission pipeline writes for a field.
 */
export type FieldDeclaration = {
  readonly name: string;
  readonly type: TypeReference;
  readonly modifiers: FieldModifiers;
  readonly defaultValue?: FieldDefaultValue;
  readonly annotations: readonly Annotation[];
};

export const toFieldDeclaration = (
  record: FieldBindingRecord,
  fallbackDefault?: FieldDefaultValue
): FieldDeclaration => {
  const { field } = record;
  const defaultValue = resolveFieldDefault(record, fallbackDefault);
  return {
    name: field.name,
    type: field.type,
    modifiers: field.modifiers,
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    annotations: appendFieldAttributes(fieldAttributeAppenderOf(record), field),
  };
};
