/**
 * Field attribute appenders
 *
 * An appender decides which annotations are written alongside a field when
 * it is emitted. Appenders are created per target type by a factory (see
 * factory.ts) and then shared by every field their rule matches.
 */

import {
  formatAnnotation,
  stableAnnotationKey,
  type Annotation,
  type FieldDescription,
} from "@classforge/description";

export type FieldAttributeAppender =
  | { readonly kind: "noOp" }
  | { readonly kind: "forInstrumentedField" }
  | { readonly kind: "explicit"; readonly annotations: readonly Annotation[] }
  | {
      readonly kind: "compound";
      readonly appenders: readonly FieldAttributeAppender[];
    }
  | {
      readonly kind: "custom";
      readonly id: string;
      readonly append: (field: FieldDescription) => readonly Annotation[];
    };

export const noOpAppender: FieldAttributeAppender = { kind: "noOp" };

export const forInstrumentedFieldAppender: FieldAttributeAppender = {
  kind: "forInstrumentedField",
};

export const explicitAppender = (
  annotations: readonly Annotation[]
): FieldAttributeAppender => ({ kind: "explicit", annotations });

/**
 * Combine appenders. Nested compounds are flattened and no-ops dropped.
 */
export const compoundAppender = (
  ...appenders: readonly FieldAttributeAppender[]
): FieldAttributeAppender => {
  const flattened = appenders.flatMap((appender) =>
    appender.kind === "compound" ? appender.appenders : [appender]
  );
  const effective = flattened.filter((appender) => appender.kind !== "noOp");
  if (effective.length === 0) return noOpAppender;
  const [single] = effective;
  if (effective.length === 1 && single) return single;
  return { kind: "compound", appenders: effective };
};

export const customAppender = (
  id: string,
  append: (field: FieldDescription) => readonly Annotation[]
): FieldAttributeAppender => ({ kind: "custom", id, append });

/**
 * Annotations to write for `field`, in order.
 */
export const appendFieldAttributes = (
  appender: FieldAttributeAppender,
  field: FieldDescription
): readonly Annotation[] => {
  switch (appender.kind) {
    case "noOp":
      return [];
    case "forInstrumentedField":
      return field.annotations;
    case "explicit":
      return appender.annotations;
    case "compound":
      return appender.appenders.flatMap((a) => appendFieldAttributes(a, field));
    case "custom":
      return appender.append(field);
  }
};

export const stableAttributeAppenderKey = (
  appender: FieldAttributeAppender
): string => {
  switch (appender.kind) {
    case "noOp":
    case "forInstrumentedField":
      return appender.kind;
    case "explicit":
      return `explicit[${appender.annotations.map(stableAnnotationKey).join(",")}]`;
    case "compound":
      return `compound[${appender.appenders.map(stableAttributeAppenderKey).join(",")}]`;
    case "custom":
      return `custom:${JSON.stringify(appender.id)}`;
  }
};

export const formatAttributeAppender = (
  appender: FieldAttributeAppender
): string => {
  switch (appender.kind) {
    case "noOp":
      return "noOp";
    case "forInstrumentedField":
      return "forInstrumentedField";
    case "explicit":
      return `explicit(${appender.annotations.map(formatAnnotation).join(" ")})`;
    case "compound":
      return `compound(${appender.appenders.map(formatAttributeAppender).join(", ")})`;
    case "custom":
      return `custom(${appender.id})`;
  }
};
