/**
 * Field attribute appender factories
 *
 * Factories are compared by value: two factories with the same stable key
 * are interchangeable, and the registry compiler instantiates each distinct
 * key once per compile. A `custom` factory's identity is its id.
 */

import {
  formatAnnotation,
  stableAnnotationKey,
  type Annotation,
  type TypeDescription,
} from "@classforge/description";
import {
  compoundAppender,
  explicitAppender,
  forInstrumentedFieldAppender,
  noOpAppender,
  type FieldAttributeAppender,
} from "./appender.js";

export type FieldAttributeAppenderFactory =
  | { readonly kind: "noOp" }
  | { readonly kind: "forInstrumentedField" }
  | { readonly kind: "explicit"; readonly annotations: readonly Annotation[] }
  | {
      readonly kind: "compound";
      readonly factories: readonly FieldAttributeAppenderFactory[];
    }
  | {
      readonly kind: "custom";
      readonly id: string;
      readonly make: (type: TypeDescription) => FieldAttributeAppender;
    };

export const noOpAppenderFactory: FieldAttributeAppenderFactory = {
  kind: "noOp",
};

export const forInstrumentedFieldAppenderFactory: FieldAttributeAppenderFactory =
  { kind: "forInstrumentedField" };

export const explicitAppenderFactory = (
  annotations: readonly Annotation[]
): FieldAttributeAppenderFactory => ({ kind: "explicit", annotations });

export const compoundAppenderFactory = (
  ...factories: readonly FieldAttributeAppenderFactory[]
): FieldAttributeAppenderFactory => ({ kind: "compound", factories });

export const customAppenderFactory = (
  id: string,
  make: (type: TypeDescription) => FieldAttributeAppender
): FieldAttributeAppenderFactory => ({ kind: "custom", id, make });

export const makeFieldAttributeAppender = (
  factory: FieldAttributeAppenderFactory,
  type: TypeDescription
): FieldAttributeAppender => {
  switch (factory.kind) {
    case "noOp":
      return noOpAppender;
    case "forInstrumentedField":
      return forInstrumentedFieldAppender;
    case "explicit":
      return explicitAppender(factory.annotations);
    case "compound":
      return compoundAppender(
        ...factory.factories.map((f) => makeFieldAttributeAppender(f, type))
      );
    case "custom":
      return factory.make(type);
  }
};

export const stableAttributeAppenderFactoryKey = (
  factory: FieldAttributeAppenderFactory
): string => {
  switch (factory.kind) {
    case "noOp":
    case "forInstrumentedField":
      return factory.kind;
    case "explicit":
      return `explicit[${factory.annotations.map(stableAnnotationKey).join(",")}]`;
    case "compound":
      return `compound[${factory.factories.map(stableAttributeAppenderFactoryKey).join(",")}]`;
    case "custom":
      return `custom:${JSON.stringify(factory.id)}`;
  }
};

export const attributeAppenderFactoriesEqual = (
  left: FieldAttributeAppenderFactory,
  right: FieldAttributeAppenderFactory
): boolean =>
  stableAttributeAppenderFactoryKey(left) ===
  stableAttributeAppenderFactoryKey(right);

export const formatAttributeAppenderFactory = (
  factory: FieldAttributeAppenderFactory
): string => {
  switch (factory.kind) {
    case "noOp":
      return "noOp";
    case "forInstrumentedField":
      return "forInstrumentedField";
    case "explicit":
      return `explicit(${factory.annotations.map(formatAnnotation).join(" ")})`;
    case "compound":
      return `compound(${factory.factories.map(formatAttributeAppenderFactory).join(", ")})`;
    case "custom":
      return `custom(${factory.id})`;
  }
};
