/**
 * Description of the type being assembled
 */

import {
  createFieldDescription,
  stableFieldKey,
  type FieldDescription,
  type FieldModifiers,
} from "./field.js";
import type { Annotation } from "./annotation.js";
import type { TypeReference } from "./type-reference.js";

export type TypeDescription = {
  readonly name: string;
  readonly superTypeName?: string;
  readonly declaredFields: readonly FieldDescription[];
};

export type DeclaredFieldInit = {
  readonly name: string;
  readonly type: TypeReference;
  readonly modifiers?: Partial<FieldModifiers>;
  readonly annotations?: readonly Annotation[];
};

export type TypeInit = {
  readonly name: string;
  readonly superTypeName?: string;
  readonly fields?: readonly DeclaredFieldInit[];
};

/**
 * Build a type description whose declared fields name it as their
 * declaring type.
 */
export const createTypeDescription = (init: TypeInit): TypeDescription => ({
  name: init.name,
  ...(init.superTypeName !== undefined
    ? { superTypeName: init.superTypeName }
    : {}),
  declaredFields: (init.fields ?? []).map((field) =>
    createFieldDescription({ ...field, declaringTypeName: init.name })
  ),
});

export const findDeclaredField = (
  type: TypeDescription,
  name: string
): FieldDescription | undefined =>
  type.declaredFields.find((field) => field.name === name);

export const stableTypeKey = (type: TypeDescription): string =>
  `type:${JSON.stringify(type.name)}:${JSON.stringify(type.superTypeName ?? null)}:[${type.declaredFields
    .map(stableFieldKey)
    .join(";")}]`;

export const typesEqual = (
  left: TypeDescription,
  right: TypeDescription
): boolean => left === right || stableTypeKey(left) === stableTypeKey(right);
