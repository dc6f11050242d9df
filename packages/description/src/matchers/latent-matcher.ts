/**
 * Latent matchers - matchers that only become concrete once bound to the
 * type being built.
 *
 * Resolution is deterministic for a fixed type: resolving the same latent
 * matcher against equal types yields matchers with equal stable keys.
 */

import type { TypeDescription } from "../types/type-description.js";
import {
  formatTypeReference,
  stableTypeReferenceKey,
  substituteTargetType,
  type TypeReference,
} from "../types/type-reference.js";
import {
  allOf,
  anyOf,
  declaredBy,
  fieldType,
  formatElementMatcher,
  named,
  stableElementMatcherKey,
  type ElementMatcher,
} from "./element-matcher.js";

/**
 * A detached field signature. A `targetType` in `type` refers to whichever
 * type the token is later resolved against.
 */
export type FieldToken = {
  readonly name: string;
  readonly type: TypeReference;
};

export type LatentMatcher =
  | { readonly kind: "resolved"; readonly matcher: ElementMatcher }
  | { readonly kind: "fieldToken"; readonly token: FieldToken }
  | { readonly kind: "selfDeclared" }
  | { readonly kind: "conjunction"; readonly matchers: readonly LatentMatcher[] }
  | { readonly kind: "disjunction"; readonly matchers: readonly LatentMatcher[] }
  | {
      readonly kind: "custom";
      readonly id: string;
      readonly resolve: (type: TypeDescription) => ElementMatcher;
    };

export const resolved = (matcher: ElementMatcher): LatentMatcher => ({
  kind: "resolved",
  matcher,
});

export const forFieldToken = (token: FieldToken): LatentMatcher => ({
  kind: "fieldToken",
  token,
});

export const selfDeclared = (): LatentMatcher => ({ kind: "selfDeclared" });

export const conjunction = (
  ...matchers: readonly LatentMatcher[]
): LatentMatcher => ({ kind: "conjunction", matchers });

export const disjunction = (
  ...matchers: readonly LatentMatcher[]
): LatentMatcher => ({ kind: "disjunction", matchers });

export const customLatentMatcher = (
  id: string,
  resolve: (type: TypeDescription) => ElementMatcher
): LatentMatcher => ({ kind: "custom", id, resolve });

export const resolveLatentMatcher = (
  matcher: LatentMatcher,
  type: TypeDescription
): ElementMatcher => {
  switch (matcher.kind) {
    case "resolved":
      return matcher.matcher;
    case "fieldToken":
      return allOf(
        named(matcher.token.name),
        fieldType(substituteTargetType(matcher.token.type, type.name))
      );
    case "selfDeclared":
      return declaredBy(type.name);
    case "conjunction":
      return allOf(...matcher.matchers.map((m) => resolveLatentMatcher(m, type)));
    case "disjunction":
      return anyOf(...matcher.matchers.map((m) => resolveLatentMatcher(m, type)));
    case "custom":
      return matcher.resolve(type);
  }
};

export const stableLatentMatcherKey = (matcher: LatentMatcher): string => {
  switch (matcher.kind) {
    case "resolved":
      return `resolved(${stableElementMatcherKey(matcher.matcher)})`;
    case "fieldToken":
      return `token(${JSON.stringify(matcher.token.name)}:${stableTypeReferenceKey(matcher.token.type)})`;
    case "selfDeclared":
      return "selfDeclared";
    case "conjunction":
      return `and(${matcher.matchers.map(stableLatentMatcherKey).join(",")})`;
    case "disjunction":
      return `or(${matcher.matchers.map(stableLatentMatcherKey).join(",")})`;
    case "custom":
      return `custom:${JSON.stringify(matcher.id)}`;
  }
};

export const latentMatchersEqual = (
  left: LatentMatcher,
  right: LatentMatcher
): boolean => stableLatentMatcherKey(left) === stableLatentMatcherKey(right);

export const formatLatentMatcher = (matcher: LatentMatcher): string => {
  switch (matcher.kind) {
    case "resolved":
      return formatElementMatcher(matcher.matcher);
    case "fieldToken":
      return `token(${matcher.token.name}: ${formatTypeReference(matcher.token.type)})`;
    case "selfDeclared":
      return "selfDeclared()";
    case "conjunction":
      return `(${matcher.matchers.map(formatLatentMatcher).join(" and ")})`;
    case "disjunction":
      return `(${matcher.matchers.map(formatLatentMatcher).join(" or ")})`;
    case "custom":
      return `custom(${matcher.id})`;
  }
};
