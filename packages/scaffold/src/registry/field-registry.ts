/**
 * Field registry - an ordered, immutable list of field rules.
 *
 * Rules are kept highest priority first. `prependFieldRule` puts the new rule
 * in front and shares the previous registry as its tail, so a registry value
 * never changes once created and prepending is O(1).
 */

import {
  constantsEqual,
  latentMatchersEqual,
  stableConstantKey,
  stableLatentMatcherKey,
  type FieldDefaultValue,
  type LatentMatcher,
} from "@classforge/description";
import {
  attributeAppenderFactoriesEqual,
  stableAttributeAppenderFactoryKey,
  type FieldAttributeAppenderFactory,
} from "../attribute/factory.js";
import {
  fieldTransformersEqual,
  stableFieldTransformerKey,
  type FieldTransformer,
} from "../transform/field-transformer.js";

export type FieldRule = {
  readonly matcher: LatentMatcher;
  readonly attributeAppenderFactory: FieldAttributeAppenderFactory;
  readonly defaultValue?: FieldDefaultValue;
  readonly transformer: FieldTransformer;
};

export type FieldRuleChain = {
  readonly rule: FieldRule;
  readonly next: FieldRuleChain | undefined;
};

export type FieldRegistry = {
  readonly kind: "fieldRegistry";
  readonly size: number;
  readonly head: FieldRuleChain | undefined;
};

const EMPTY: FieldRegistry = { kind: "fieldRegistry", size: 0, head: undefined };

export const emptyFieldRegistry = (): FieldRegistry => EMPTY;

export const createFieldRule = (
  matcher: LatentMatcher,
  attributeAppenderFactory: FieldAttributeAppenderFactory,
  defaultValue: FieldDefaultValue | undefined,
  transformer: FieldTransformer
): FieldRule => ({
  matcher,
  attributeAppenderFactory,
  ...(defaultValue !== undefined ? { defaultValue } : {}),
  transformer,
});

/**
 * Return a registry in which the new rule takes precedence over every rule
 * of `registry`. `registry` itself is left untouched.
 */
export const prependFieldRule = (
  registry: FieldRegistry,
  matcher: LatentMatcher,
  attributeAppenderFactory: FieldAttributeAppenderFactory,
  defaultValue: FieldDefaultValue | undefined,
  transformer: FieldTransformer
): FieldRegistry => ({
  kind: "fieldRegistry",
  size: registry.size + 1,
  head: {
    rule: createFieldRule(
      matcher,
      attributeAppenderFactory,
      defaultValue,
      transformer
    ),
    next: registry.head,
  },
});

/**
 * Rules in dispatch order (highest priority first).
 */
export const fieldRules = (registry: FieldRegistry): readonly FieldRule[] => {
  const rules: FieldRule[] = [];
  for (let link = registry.head; link !== undefined; link = link.next) {
    rules.push(link.rule);
  }
  return rules;
};

export const fieldRulesEqual = (left: FieldRule, right: FieldRule): boolean =>
  left === right ||
  (latentMatchersEqual(left.matcher, right.matcher) &&
    attributeAppenderFactoriesEqual(
      left.attributeAppenderFactory,
      right.attributeAppenderFactory
    ) &&
    constantsEqual(left.defaultValue, right.defaultValue) &&
    fieldTransformersEqual(left.transformer, right.transformer));

export const stableFieldRuleKey = (rule: FieldRule): string =>
  [
    stableLatentMatcherKey(rule.matcher),
    stableAttributeAppenderFactoryKey(rule.attributeAppenderFactory),
    stableConstantKey(rule.defaultValue),
    stableFieldTransformerKey(rule.transformer),
  ].join("|");

export const fieldRegistriesEqual = (
  left: FieldRegistry,
  right: FieldRegistry
): boolean => {
  if (left === right) return true;
  if (left.size !== right.size) return false;

  let l = left.head;
  let r = right.head;
  while (l !== undefined && r !== undefined) {
    // Shared tails are equal from here on
    if (l === r) return true;
    if (!fieldRulesEqual(l.rule, r.rule)) return false;
    l = l.next;
    r = r.next;
  }
  return l === r;
};

export const stableFieldRegistryKey = (registry: FieldRegistry): string =>
  `fields[${fieldRules(registry).map(stableFieldRuleKey).join(";")}]`;
