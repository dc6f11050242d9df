import { describe, it } from "mocha";
import { expect } from "chai";
import { annotation, formatAnnotation } from "./annotation.js";
import { constantsEqual, formatConstant, stableConstantKey } from "./constant.js";
import {
  createFieldDescription,
  fieldsEqual,
  formatField,
  stableFieldModifiersKey,
} from "./field.js";
import {
  createTypeDescription,
  findDeclaredField,
  typesEqual,
} from "./type-description.js";
import { primitiveType, referenceType } from "./type-reference.js";

describe("field descriptions", () => {
  it("should fill modifiers with private instance defaults", () => {
    const field = createFieldDescription({
      name: "count",
      type: primitiveType("int"),
      declaringTypeName: "shop.Cart",
      modifiers: { isFinal: true },
    });

    expect(field.modifiers).to.deep.equal({
      visibility: "private",
      isStatic: false,
      isFinal: true,
      isVolatile: false,
      isTransient: false,
      isSynthetic: false,
    });
    expect(field.annotations).to.deep.equal([]);
  });

  it("should render modifiers in declaration order", () => {
    const field = createFieldDescription({
      name: "INSTANCE",
      type: referenceType("shop.Cart"),
      declaringTypeName: "shop.Cart",
      modifiers: { visibility: "public", isStatic: true, isFinal: true },
    });

    expect(stableFieldModifiersKey(field.modifiers)).to.equal(
      "public static final"
    );
    expect(formatField(field)).to.equal(
      "public static final shop.Cart shop.Cart.INSTANCE"
    );
  });

  it("should compare fields by value, annotations included", () => {
    const init = {
      name: "id",
      type: primitiveType("long"),
      declaringTypeName: "shop.Order",
    };
    const plain = createFieldDescription(init);

    expect(fieldsEqual(plain, createFieldDescription(init))).to.equal(true);
    expect(
      fieldsEqual(
        plain,
        createFieldDescription({ ...init, annotations: [annotation("Id")] })
      )
    ).to.equal(false);
  });
});

describe("type descriptions", () => {
  const order = createTypeDescription({
    name: "shop.Order",
    superTypeName: "shop.Entity",
    fields: [
      { name: "id", type: primitiveType("long") },
      { name: "total", type: primitiveType("double") },
    ],
  });

  it("should mark declared fields with their declaring type", () => {
    expect(order.declaredFields.map((f) => f.declaringTypeName)).to.deep.equal([
      "shop.Order",
      "shop.Order",
    ]);
    expect(findDeclaredField(order, "total")?.type).to.deep.equal(
      primitiveType("double")
    );
    expect(findDeclaredField(order, "missing")).to.equal(undefined);
  });

  it("should compare types by value", () => {
    const same = createTypeDescription({
      name: "shop.Order",
      superTypeName: "shop.Entity",
      fields: [
        { name: "id", type: primitiveType("long") },
        { name: "total", type: primitiveType("double") },
      ],
    });
    const withoutSuper = createTypeDescription({ name: "shop.Order" });

    expect(typesEqual(order, same)).to.equal(true);
    expect(typesEqual(order, withoutSuper)).to.equal(false);
  });
});

describe("constants and annotations", () => {
  it("should apply nullable value equality", () => {
    expect(constantsEqual(undefined, undefined)).to.equal(true);
    expect(constantsEqual(undefined, 0)).to.equal(false);
    expect(constantsEqual(7, 7)).to.equal(true);
    expect(constantsEqual(7, 7n)).to.equal(false);
    expect(constantsEqual("7", 7)).to.equal(false);
    expect(constantsEqual(0, -0)).to.equal(false);
  });

  it("should give each constant kind a distinct key", () => {
    expect(stableConstantKey("a")).to.equal('s:"a"');
    expect(stableConstantKey(1.5)).to.equal("n:1.5");
    expect(stableConstantKey(12n)).to.equal("l:12");
    expect(stableConstantKey(false)).to.equal("b:0");
    expect(formatConstant(12n)).to.equal("12n");
  });

  it("should format annotations with their properties", () => {
    const value = annotation("Column", [
      { name: "name", value: "order_id" },
      { name: "groups", value: { kind: "array", elements: [1, 2] } },
    ]);
    expect(formatAnnotation(value)).to.equal(
      '@Column(name = "order_id", groups = {1, 2})'
    );
    expect(formatAnnotation(annotation("Id"))).to.equal("@Id");
  });
});
