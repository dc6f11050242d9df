/**
 * Field descriptions
 *
 * A field description is an immutable value. Field types inside a
 * description of a concrete type are always concrete; `targetType` is only
 * meaningful in detached field tokens (see latent matchers).
 */

import {
  formatAnnotation,
  stableAnnotationKey,
  type Annotation,
} from "./annotation.js";
import {
  formatTypeReference,
  stableTypeReferenceKey,
  type TypeReference,
} from "./type-reference.js";

export type Visibility = "public" | "protected" | "package" | "private";

export type FieldModifiers = {
  readonly visibility: Visibility;
  readonly isStatic: boolean;
  readonly isFinal: boolean;
  readonly isVolatile: boolean;
  readonly isTransient: boolean;
  readonly isSynthetic: boolean;
};

export type FieldDescription = {
  readonly name: string;
  readonly type: TypeReference;
  readonly modifiers: FieldModifiers;
  readonly declaringTypeName: string;
  readonly annotations: readonly Annotation[];
};

export const defaultFieldModifiers: FieldModifiers = {
  visibility: "private",
  isStatic: false,
  isFinal: false,
  isVolatile: false,
  isTransient: false,
  isSynthetic: false,
};

export type FieldInit = {
  readonly name: string;
  readonly type: TypeReference;
  readonly declaringTypeName: string;
  readonly modifiers?: Partial<FieldModifiers>;
  readonly annotations?: readonly Annotation[];
};

export const createFieldDescription = (init: FieldInit): FieldDescription => ({
  name: init.name,
  type: init.type,
  declaringTypeName: init.declaringTypeName,
  modifiers: { ...defaultFieldModifiers, ...init.modifiers },
  annotations: init.annotations ?? [],
});

export const stableFieldModifiersKey = (modifiers: FieldModifiers): string =>
  [
    modifiers.visibility,
    modifiers.isStatic ? "static" : "",
    modifiers.isFinal ? "final" : "",
    modifiers.isVolatile ? "volatile" : "",
    modifiers.isTransient ? "transient" : "",
    modifiers.isSynthetic ? "synthetic" : "",
  ]
    .filter((part) => part.length > 0)
    .join(" ");

export const stableFieldKey = (field: FieldDescription): string =>
  [
    `field:${JSON.stringify(field.declaringTypeName)}`,
    JSON.stringify(field.name),
    stableTypeReferenceKey(field.type),
    stableFieldModifiersKey(field.modifiers),
    field.annotations.map(stableAnnotationKey).join(","),
  ].join("|");

export const fieldsEqual = (
  left: FieldDescription,
  right: FieldDescription
): boolean => stableFieldKey(left) === stableFieldKey(right);

/**
 * Render a field the way it would read in a declaration, without annotations.
 */
export const formatField = (field: FieldDescription): string =>
  `${stableFieldModifiersKey(field.modifiers)} ${formatTypeReference(field.type)} ${field.declaringTypeName}.${field.name}`;

export const formatFieldAnnotations = (field: FieldDescription): string =>
  field.annotations.map(formatAnnotation).join(" ");
