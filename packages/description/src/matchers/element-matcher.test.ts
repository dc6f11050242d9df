import { describe, it } from "mocha";
import { expect } from "chai";
import { annotation } from "../types/annotation.js";
import { createFieldDescription } from "../types/field.js";
import { primitiveType, referenceType } from "../types/type-reference.js";
import {
  allOf,
  annotatedWith,
  anyField,
  anyOf,
  customMatcher,
  declaredBy,
  elementMatchersEqual,
  fieldType,
  formatElementMatcher,
  hasVisibility,
  isFinalField,
  isStaticField,
  matchesField,
  nameMatches,
  nameStartsWith,
  named,
  noField,
  not,
  stableElementMatcherKey,
} from "./element-matcher.js";

const idField = createFieldDescription({
  name: "id",
  type: primitiveType("long"),
  declaringTypeName: "shop.Order",
  modifiers: { isFinal: true },
  annotations: [annotation("Id")],
});

const counterField = createFieldDescription({
  name: "counter",
  type: referenceType("java.util.concurrent.atomic.AtomicLong"),
  declaringTypeName: "shop.Base",
  modifiers: { visibility: "protected", isStatic: true },
});

describe("element matchers", () => {
  it("should evaluate leaf matchers against field properties", () => {
    expect(matchesField(anyField(), idField)).to.equal(true);
    expect(matchesField(noField(), idField)).to.equal(false);
    expect(matchesField(named("id"), idField)).to.equal(true);
    expect(matchesField(named("ID"), idField)).to.equal(false);
    expect(matchesField(nameStartsWith("coun"), counterField)).to.equal(true);
    expect(matchesField(isStaticField(), counterField)).to.equal(true);
    expect(matchesField(isStaticField(), idField)).to.equal(false);
    expect(matchesField(isFinalField(), idField)).to.equal(true);
    expect(matchesField(hasVisibility("protected"), counterField)).to.equal(
      true
    );
    expect(matchesField(fieldType(primitiveType("long")), idField)).to.equal(
      true
    );
    expect(matchesField(declaredBy("shop.Base"), idField)).to.equal(false);
    expect(matchesField(annotatedWith("Id"), idField)).to.equal(true);
  });

  it("should require a pattern to match the whole name", () => {
    expect(matchesField(nameMatches("i|id"), idField)).to.equal(true);
    expect(matchesField(nameMatches("i"), idField)).to.equal(false);
  });

  it("should reject an invalid pattern when the matcher is built", () => {
    expect(() => nameMatches("(")).to.throw(SyntaxError);
  });

  it("should reuse one compiled pattern for every field", () => {
    const matcher = nameMatches("id|count");
    expect(matchesField(matcher, idField)).to.equal(true);
    expect(matchesField(matcher, counterField)).to.equal(false);
    expect(matchesField(matcher, idField)).to.equal(true);
  });

  it("should combine matchers", () => {
    const matcher = allOf(
      not(isStaticField()),
      anyOf(named("id"), named("uuid"))
    );
    expect(matchesField(matcher, idField)).to.equal(true);
    expect(matchesField(matcher, counterField)).to.equal(false);
    expect(matchesField(allOf(), idField)).to.equal(true);
    expect(matchesField(anyOf(), idField)).to.equal(false);
  });

  it("should compare matchers by shape, custom matchers by id", () => {
    expect(
      elementMatchersEqual(allOf(named("a"), isStaticField()), allOf(named("a"), isStaticField()))
    ).to.equal(true);
    expect(elementMatchersEqual(named("a"), nameStartsWith("a"))).to.equal(
      false
    );
    expect(
      elementMatchersEqual(
        customMatcher("even-length", (f) => f.name.length % 2 === 0),
        customMatcher("even-length", () => false)
      )
    ).to.equal(true);
    expect(stableElementMatcherKey(not(named("x")))).to.equal(
      'not(named:"x")'
    );
  });

  it("should delegate to custom predicates", () => {
    const seen: string[] = [];
    const matcher = customMatcher("spy", (f) => {
      seen.push(f.name);
      return true;
    });

    expect(matchesField(matcher, counterField)).to.equal(true);
    expect(seen).to.deep.equal(["counter"]);
  });

  it("should format matchers for display", () => {
    expect(
      formatElementMatcher(allOf(named("id"), not(isStaticField())))
    ).to.equal("(named(id) and not(isStatic()))");
  });
});
