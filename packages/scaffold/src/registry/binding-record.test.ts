import { describe, it } from "mocha";
import { expect } from "chai";
import {
  annotation,
  createFieldDescription,
  primitiveType,
} from "@classforge/description";
import {
  explicitAppender,
  forInstrumentedFieldAppender,
} from "../attribute/appender.js";
import {
  explicitFieldRecord,
  fieldAttributeAppenderOf,
  implicitFieldRecord,
  isImplicitField,
  resolveFieldDefault,
  toFieldDeclaration,
} from "./binding-record.js";

const version = createFieldDescription({
  name: "version",
  type: primitiveType("int"),
  declaringTypeName: "shop.Order",
  modifiers: { isStatic: true },
  annotations: [annotation("Deprecated")],
});

describe("field binding records", () => {
  const appender = explicitAppender([annotation("Version")]);

  it("should distinguish implicit from explicit records", () => {
    expect(isImplicitField(implicitFieldRecord(version))).to.equal(true);
    expect(
      isImplicitField(explicitFieldRecord(appender, undefined, version))
    ).to.equal(false);
  });

  it("should resolve defaults with the record's own value first", () => {
    expect(
      resolveFieldDefault(explicitFieldRecord(appender, 3, version), 9)
    ).to.equal(3);
    expect(
      resolveFieldDefault(explicitFieldRecord(appender, undefined, version), 9)
    ).to.equal(9);
    expect(resolveFieldDefault(implicitFieldRecord(version), 9)).to.equal(9);
    expect(resolveFieldDefault(implicitFieldRecord(version), undefined)).to.equal(
      undefined
    );
  });

  it("should keep declared annotations for implicit records", () => {
    expect(fieldAttributeAppenderOf(implicitFieldRecord(version))).to.equal(
      forInstrumentedFieldAppender
    );
    expect(
      fieldAttributeAppenderOf(explicitFieldRecord(appender, undefined, version))
    ).to.equal(appender);
  });

  it("should build the declaration for an explicit record", () => {
    expect(
      toFieldDeclaration(explicitFieldRecord(appender, 1, version))
    ).to.deep.equal({
      name: "version",
      type: primitiveType("int"),
      modifiers: version.modifiers,
      defaultValue: 1,
      annotations: [annotation("Version")],
    });
  });

  it("should build the declaration for an implicit record", () => {
    expect(toFieldDeclaration(implicitFieldRecord(version))).to.deep.equal({
      name: "version",
      type: primitiveType("int"),
      modifiers: version.modifiers,
      annotations: [annotation("Deprecated")],
    });
  });
});
