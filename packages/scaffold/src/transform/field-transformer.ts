/**
 * Field transformers
 *
 * A transformer rewrites the description of a field its rule matched. It is
 * stored by the compiled registry and only applied when a field is bound,
 * with the instrumented type and the field actually being bound.
 */

import {
  type FieldDescription,
  type FieldModifiers,
  type TypeDescription,
} from "@classforge/description";

export type FieldTransformer =
  | { readonly kind: "noOp" }
  | { readonly kind: "modifiers"; readonly changes: Partial<FieldModifiers> }
  | { readonly kind: "rename"; readonly name: string }
  | {
      readonly kind: "compound";
      readonly transformers: readonly FieldTransformer[];
    }
  | {
      readonly kind: "custom";
      readonly id: string;
      readonly transform: (
        type: TypeDescription,
        field: FieldDescription
      ) => FieldDescription;
    };

export const noOpTransformer: FieldTransformer = { kind: "noOp" };

export const withModifiers = (
  changes: Partial<FieldModifiers>
): FieldTransformer => ({ kind: "modifiers", changes });

export const renamedTo = (name: string): FieldTransformer => ({
  kind: "rename",
  name,
});

export const compoundTransformer = (
  ...transformers: readonly FieldTransformer[]
): FieldTransformer => ({ kind: "compound", transformers });

export const customTransformer = (
  id: string,
  transform: (type: TypeDescription, field: FieldDescription) => FieldDescription
): FieldTransformer => ({ kind: "custom", id, transform });

export const transformField = (
  transformer: FieldTransformer,
  type: TypeDescription,
  field: FieldDescription
): FieldDescription => {
  switch (transformer.kind) {
    case "noOp":
      return field;
    case "modifiers":
      return {
        ...field,
        modifiers: applyModifierChanges(field.modifiers, transformer.changes),
      };
    case "rename":
      return { ...field, name: transformer.name };
    case "compound":
      return transformer.transformers.reduce(
        (current, t) => transformField(t, type, current),
        field
      );
    case "custom":
      return transformer.transform(type, field);
  }
};

const modifierKeys: readonly (keyof FieldModifiers)[] = [
  "visibility",
  "isStatic",
  "isFinal",
  "isVolatile",
  "isTransient",
  "isSynthetic",
];

const modifierChangesKey = (changes: Partial<FieldModifiers>): string =>
  modifierKeys
    .filter((key) => changes[key] !== undefined)
    .map((key) => `${key}=${String(changes[key])}`)
    .join(",");

const applyModifierChanges = (
  modifiers: FieldModifiers,
  changes: Partial<FieldModifiers>
): FieldModifiers => ({
  visibility: changes.visibility ?? modifiers.visibility,
  isStatic: changes.isStatic ?? modifiers.isStatic,
  isFinal: changes.isFinal ?? modifiers.isFinal,
  isVolatile: changes.isVolatile ?? modifiers.isVolatile,
  isTransient: changes.isTransient ?? modifiers.isTransient,
  isSynthetic: changes.isSynthetic ?? modifiers.isSynthetic,
});

export const stableFieldTransformerKey = (
  transformer: FieldTransformer
): string => {
  switch (transformer.kind) {
    case "noOp":
      return "noOp";
    case "modifiers":
      return `modifiers{${modifierChangesKey(transformer.changes)}}`;
    case "rename":
      return `rename:${JSON.stringify(transformer.name)}`;
    case "compound":
      return `compound[${transformer.transformers.map(stableFieldTransformerKey).join(",")}]`;
    case "custom":
      return `custom:${JSON.stringify(transformer.id)}`;
  }
};

export const fieldTransformersEqual = (
  left: FieldTransformer,
  right: FieldTransformer
): boolean =>
  stableFieldTransformerKey(left) === stableFieldTransformerKey(right);

export const formatFieldTransformer = (transformer: FieldTransformer): string => {
  switch (transformer.kind) {
    case "noOp":
      return "noOp";
    case "modifiers":
      return `modifiers(${modifierChangesKey(transformer.changes)})`;
    case "rename":
      return `rename(${transformer.name})`;
    case "compound":
      return `compound(${transformer.transformers.map(formatFieldTransformer).join(", ")})`;
    case "custom":
      return `custom(${transformer.id})`;
  }
};
