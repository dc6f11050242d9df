/**
 * Annotations attached to fields
 */

import {
  formatConstant,
  stableConstantKey,
  type FieldDefaultValue,
} from "./constant.js";

export type AnnotationValue =
  | FieldDefaultValue
  | { readonly kind: "array"; readonly elements: readonly AnnotationValue[] };

export type AnnotationProperty = {
  readonly name: string;
  readonly value: AnnotationValue;
};

export type Annotation = {
  readonly typeName: string;
  readonly properties: readonly AnnotationProperty[];
};

export const annotation = (
  typeName: string,
  properties: readonly AnnotationProperty[] = []
): Annotation => ({ typeName, properties });

const stableAnnotationValueKey = (value: AnnotationValue): string =>
  typeof value === "object"
    ? `[${value.elements.map(stableAnnotationValueKey).join(",")}]`
    : stableConstantKey(value);

export const stableAnnotationKey = (value: Annotation): string => {
  const properties = value.properties
    .map((p) => `${JSON.stringify(p.name)}=${stableAnnotationValueKey(p.value)}`)
    .join(",");
  return `@${JSON.stringify(value.typeName)}(${properties})`;
};

export const annotationsEqual = (left: Annotation, right: Annotation): boolean =>
  stableAnnotationKey(left) === stableAnnotationKey(right);

const formatAnnotationValue = (value: AnnotationValue): string =>
  typeof value === "object"
    ? `{${value.elements.map(formatAnnotationValue).join(", ")}}`
    : formatConstant(value);

export const formatAnnotation = (value: Annotation): string =>
  value.properties.length === 0
    ? `@${value.typeName}`
    : `@${value.typeName}(${value.properties
        .map((p) => `${p.name} = ${formatAnnotationValue(p.value)}`)
        .join(", ")})`;
