/**
 * Constant values: field defaults and annotation values
 */

/**
 * A constant a field may be initialized with. Absence is `undefined`.
 */
export type FieldDefaultValue = string | number | bigint | boolean;

export const stableConstantKey = (
  value: FieldDefaultValue | undefined
): string => {
  switch (typeof value) {
    case "undefined":
      return "none";
    case "string":
      return `s:${JSON.stringify(value)}`;
    case "number":
      // -0 and 0 are distinct constants
      return Object.is(value, -0) ? "n:-0" : `n:${String(value)}`;
    case "bigint":
      return `l:${value.toString()}`;
    case "boolean":
      return value ? "b:1" : "b:0";
  }
};

/**
 * Nullable value equality: two absent values are equal, an absent value
 * never equals a present one, present values compare by kind and value.
 */
export const constantsEqual = (
  left: FieldDefaultValue | undefined,
  right: FieldDefaultValue | undefined
): boolean => stableConstantKey(left) === stableConstantKey(right);

export const formatConstant = (value: FieldDefaultValue | undefined): string => {
  switch (typeof value) {
    case "undefined":
      return "none";
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value.toString()}n`;
    default:
      return String(value);
  }
};
