/**
 * Type references used by field descriptions and field tokens.
 *
 * `targetType` stands for "the type being built". It only appears in
 * detached descriptions (field tokens) and is replaced by a concrete
 * reference once a target is known.
 */

export type PrimitiveTypeName =
  | "boolean"
  | "byte"
  | "char"
  | "short"
  | "int"
  | "long"
  | "float"
  | "double";

export type TypeReference =
  | { readonly kind: "primitiveType"; readonly name: PrimitiveTypeName }
  | {
      readonly kind: "referenceType";
      readonly name: string;
      readonly typeArguments?: readonly TypeReference[];
    }
  | { readonly kind: "arrayType"; readonly elementType: TypeReference }
  | { readonly kind: "targetType" };

export const primitiveType = (name: PrimitiveTypeName): TypeReference => ({
  kind: "primitiveType",
  name,
});

export const referenceType = (
  name: string,
  typeArguments?: readonly TypeReference[]
): TypeReference =>
  typeArguments && typeArguments.length > 0
    ? { kind: "referenceType", name, typeArguments }
    : { kind: "referenceType", name };

export const arrayType = (elementType: TypeReference): TypeReference => ({
  kind: "arrayType",
  elementType,
});

export const targetType = (): TypeReference => ({ kind: "targetType" });

export const stableTypeReferenceKey = (type: TypeReference): string => {
  switch (type.kind) {
    case "primitiveType":
      return `prim:${type.name}`;
    case "referenceType": {
      const args = (type.typeArguments ?? []).map(stableTypeReferenceKey);
      return args.length > 0
        ? `ref:${JSON.stringify(type.name)}<${args.join(",")}>`
        : `ref:${JSON.stringify(type.name)}`;
    }
    case "arrayType":
      return `arr:${stableTypeReferenceKey(type.elementType)}`;
    case "targetType":
      return "target";
  }
};

export const typeReferencesEqual = (
  left: TypeReference,
  right: TypeReference
): boolean => stableTypeReferenceKey(left) === stableTypeReferenceKey(right);

/**
 * Replace every `targetType` placeholder with a reference to `typeName`.
 */
export const substituteTargetType = (
  type: TypeReference,
  typeName: string
): TypeReference => {
  switch (type.kind) {
    case "primitiveType":
      return type;
    case "referenceType":
      return type.typeArguments
        ? referenceType(
            type.name,
            type.typeArguments.map((arg) => substituteTargetType(arg, typeName))
          )
        : type;
    case "arrayType":
      return arrayType(substituteTargetType(type.elementType, typeName));
    case "targetType":
      return referenceType(typeName);
  }
};

export const formatTypeReference = (type: TypeReference): string => {
  switch (type.kind) {
    case "primitiveType":
      return type.name;
    case "referenceType":
      return type.typeArguments && type.typeArguments.length > 0
        ? `${type.name}<${type.typeArguments.map(formatTypeReference).join(", ")}>`
        : type.name;
    case "arrayType":
      return `${formatTypeReference(type.elementType)}[]`;
    case "targetType":
      return "<target>";
  }
};
