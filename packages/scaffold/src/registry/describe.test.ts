import { describe, it } from "mocha";
import { expect } from "chai";
import {
  annotation,
  createTypeDescription,
  named,
  resolved,
  selfDeclared,
} from "@classforge/description";
import {
  explicitAppenderFactory,
  noOpAppenderFactory,
} from "../attribute/factory.js";
import {
  noOpTransformer,
  renamedTo,
} from "../transform/field-transformer.js";
import { compileFieldRegistry } from "./compiler.js";
import { noOpCompiledFieldRegistry } from "./compiled-registry.js";
import {
  describeCompiledFieldRegistry,
  describeFieldRegistry,
} from "./describe.js";
import { emptyFieldRegistry, prependFieldRule } from "./field-registry.js";

describe("registry descriptions", () => {
  const registry = prependFieldRule(
    prependFieldRule(
      emptyFieldRegistry(),
      selfDeclared(),
      noOpAppenderFactory,
      undefined,
      noOpTransformer
    ),
    resolved(named("id")),
    explicitAppenderFactory([annotation("Id")]),
    "none-yet",
    renamedTo("key")
  );

  it("should describe rules in priority order", () => {
    expect(describeFieldRegistry(registry)).to.equal(
      'FieldRegistry[{matcher=named(id), appender=explicit(@Id), default="none-yet", transformer=rename(key)}, {matcher=selfDeclared(), appender=noOp, default=none, transformer=noOp}]'
    );
  });

  it("should describe compiled entries with resolved matchers", () => {
    const compiled = compileFieldRegistry(
      registry,
      createTypeDescription({ name: "shop.Order" })
    );
    expect(describeCompiledFieldRegistry(compiled)).to.equal(
      'CompiledFieldRegistry(shop.Order)[{matcher=named(id), appender=explicit(@Id), default="none-yet", transformer=rename(key)}, {matcher=declaredBy(shop.Order), appender=noOp, default=none, transformer=noOp}]'
    );
    expect(describeCompiledFieldRegistry(noOpCompiledFieldRegistry)).to.equal(
      "CompiledFieldRegistry.noOp"
    );
  });

  it("should describe the empty registry", () => {
    expect(describeFieldRegistry(emptyFieldRegistry())).to.equal(
      "FieldRegistry[]"
    );
  });
});
