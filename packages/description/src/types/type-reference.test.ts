import { describe, it } from "mocha";
import { expect } from "chai";
import {
  arrayType,
  formatTypeReference,
  primitiveType,
  referenceType,
  stableTypeReferenceKey,
  substituteTargetType,
  targetType,
  typeReferencesEqual,
} from "./type-reference.js";

describe("type references", () => {
  it("should give structurally equal references the same key", () => {
    const left = referenceType("java.util.List", [referenceType("Order")]);
    const right = referenceType("java.util.List", [referenceType("Order")]);

    expect(left).to.not.equal(right);
    expect(typeReferencesEqual(left, right)).to.equal(true);
    expect(stableTypeReferenceKey(left)).to.equal(
      'ref:"java.util.List"<ref:"Order">'
    );
  });

  it("should distinguish arrays from their element type", () => {
    expect(
      typeReferencesEqual(primitiveType("int"), arrayType(primitiveType("int")))
    ).to.equal(false);
  });

  it("should drop an empty type argument list", () => {
    expect(referenceType("Order", [])).to.deep.equal({
      kind: "referenceType",
      name: "Order",
    });
  });

  it("should substitute the target placeholder at any depth", () => {
    const type = referenceType("Map", [
      primitiveType("long"),
      arrayType(targetType()),
    ]);

    expect(substituteTargetType(type, "shop.Order")).to.deep.equal(
      referenceType("Map", [
        primitiveType("long"),
        arrayType(referenceType("shop.Order")),
      ])
    );
  });

  it("should format references for display", () => {
    const type = referenceType("Map", [
      referenceType("String"),
      arrayType(primitiveType("byte")),
    ]);
    expect(formatTypeReference(type)).to.equal("Map<String, byte[]>");
    expect(formatTypeReference(targetType())).to.equal("<target>");
  });
});
