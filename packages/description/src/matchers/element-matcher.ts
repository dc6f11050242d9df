/**
 * Element matchers - concrete predicates over field descriptions.
 *
 * Matchers are plain data so that two independently built matchers with the
 * same shape compare equal (by stable key). The only behaviour that cannot be
 * described as data is a `custom` matcher, which carries a caller-chosen id;
 * the id is its identity.
 */

import type { FieldDescription, Visibility } from "../types/field.js";
import {
  formatTypeReference,
  stableTypeReferenceKey,
  type TypeReference,
} from "../types/type-reference.js";

export type ElementMatcher =
  | { readonly kind: "any" }
  | { readonly kind: "none" }
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "nameStartsWith"; readonly prefix: string }
  | {
      readonly kind: "nameMatches";
      readonly pattern: string;
      /** Compiled once from `pattern`, anchored to the whole name */
      readonly regex: RegExp;
    }
  | { readonly kind: "isStatic" }
  | { readonly kind: "isFinal" }
  | { readonly kind: "hasVisibility"; readonly visibility: Visibility }
  | { readonly kind: "fieldType"; readonly type: TypeReference }
  | { readonly kind: "declaredBy"; readonly typeName: string }
  | { readonly kind: "annotatedWith"; readonly typeName: string }
  | { readonly kind: "not"; readonly matcher: ElementMatcher }
  | { readonly kind: "allOf"; readonly matchers: readonly ElementMatcher[] }
  | { readonly kind: "anyOf"; readonly matchers: readonly ElementMatcher[] }
  | {
      readonly kind: "custom";
      readonly id: string;
      readonly matches: (field: FieldDescription) => boolean;
    };

export const anyField = (): ElementMatcher => ({ kind: "any" });

export const noField = (): ElementMatcher => ({ kind: "none" });

export const named = (name: string): ElementMatcher => ({ kind: "named", name });

export const nameStartsWith = (prefix: string): ElementMatcher => ({
  kind: "nameStartsWith",
  prefix,
});

/**
 * Match names against a regular expression source. The whole name must match.
 * An invalid pattern throws a `SyntaxError` here, when the rule is built.
 */
export const nameMatches = (pattern: string): ElementMatcher => ({
  kind: "nameMatches",
  pattern,
  regex: new RegExp(`^(?:${pattern})$`),
});

export const isStaticField = (): ElementMatcher => ({ kind: "isStatic" });

export const isFinalField = (): ElementMatcher => ({ kind: "isFinal" });

export const hasVisibility = (visibility: Visibility): ElementMatcher => ({
  kind: "hasVisibility",
  visibility,
});

export const fieldType = (type: TypeReference): ElementMatcher => ({
  kind: "fieldType",
  type,
});

export const declaredBy = (typeName: string): ElementMatcher => ({
  kind: "declaredBy",
  typeName,
});

export const annotatedWith = (typeName: string): ElementMatcher => ({
  kind: "annotatedWith",
  typeName,
});

export const not = (matcher: ElementMatcher): ElementMatcher => ({
  kind: "not",
  matcher,
});

export const allOf = (...matchers: readonly ElementMatcher[]): ElementMatcher => ({
  kind: "allOf",
  matchers,
});

export const anyOf = (...matchers: readonly ElementMatcher[]): ElementMatcher => ({
  kind: "anyOf",
  matchers,
});

export const customMatcher = (
  id: string,
  matches: (field: FieldDescription) => boolean
): ElementMatcher => ({ kind: "custom", id, matches });

export const matchesField = (
  matcher: ElementMatcher,
  field: FieldDescription
): boolean => {
  switch (matcher.kind) {
    case "any":
      return true;
    case "none":
      return false;
    case "named":
      return field.name === matcher.name;
    case "nameStartsWith":
      return field.name.startsWith(matcher.prefix);
    case "nameMatches":
      return matcher.regex.test(field.name);
    case "isStatic":
      return field.modifiers.isStatic;
    case "isFinal":
      return field.modifiers.isFinal;
    case "hasVisibility":
      return field.modifiers.visibility === matcher.visibility;
    case "fieldType":
      return (
        stableTypeReferenceKey(field.type) ===
        stableTypeReferenceKey(matcher.type)
      );
    case "declaredBy":
      return field.declaringTypeName === matcher.typeName;
    case "annotatedWith":
      return field.annotations.some((a) => a.typeName === matcher.typeName);
    case "not":
      return !matchesField(matcher.matcher, field);
    case "allOf":
      return matcher.matchers.every((m) => matchesField(m, field));
    case "anyOf":
      return matcher.matchers.some((m) => matchesField(m, field));
    case "custom":
      return matcher.matches(field);
  }
};

export const stableElementMatcherKey = (matcher: ElementMatcher): string => {
  switch (matcher.kind) {
    case "any":
    case "none":
    case "isStatic":
    case "isFinal":
      return matcher.kind;
    case "named":
      return `named:${JSON.stringify(matcher.name)}`;
    case "nameStartsWith":
      return `prefix:${JSON.stringify(matcher.prefix)}`;
    case "nameMatches":
      return `pattern:${JSON.stringify(matcher.pattern)}`;
    case "hasVisibility":
      return `visibility:${matcher.visibility}`;
    case "fieldType":
      return `type:${stableTypeReferenceKey(matcher.type)}`;
    case "declaredBy":
      return `declaredBy:${JSON.stringify(matcher.typeName)}`;
    case "annotatedWith":
      return `annotatedWith:${JSON.stringify(matcher.typeName)}`;
    case "not":
      return `not(${stableElementMatcherKey(matcher.matcher)})`;
    case "allOf":
      return `allOf(${matcher.matchers.map(stableElementMatcherKey).join(",")})`;
    case "anyOf":
      return `anyOf(${matcher.matchers.map(stableElementMatcherKey).join(",")})`;
    case "custom":
      return `custom:${JSON.stringify(matcher.id)}`;
  }
};

export const elementMatchersEqual = (
  left: ElementMatcher,
  right: ElementMatcher
): boolean => stableElementMatcherKey(left) === stableElementMatcherKey(right);

export const formatElementMatcher = (matcher: ElementMatcher): string => {
  switch (matcher.kind) {
    case "any":
      return "any()";
    case "none":
      return "none()";
    case "named":
      return `named(${matcher.name})`;
    case "nameStartsWith":
      return `nameStartsWith(${matcher.prefix})`;
    case "nameMatches":
      return `nameMatches(/${matcher.pattern}/)`;
    case "isStatic":
      return "isStatic()";
    case "isFinal":
      return "isFinal()";
    case "hasVisibility":
      return `hasVisibility(${matcher.visibility})`;
    case "fieldType":
      return `fieldType(${formatTypeReference(matcher.type)})`;
    case "declaredBy":
      return `declaredBy(${matcher.typeName})`;
    case "annotatedWith":
      return `annotatedWith(@${matcher.typeName})`;
    case "not":
      return `not(${formatElementMatcher(matcher.matcher)})`;
    case "allOf":
      return `(${matcher.matchers.map(formatElementMatcher).join(" and ")})`;
    case "anyOf":
      return `(${matcher.matchers.map(formatElementMatcher).join(" or ")})`;
    case "custom":
      return `custom(${matcher.id})`;
  }
};
