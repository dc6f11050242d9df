import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, type Result } from "./result.js";

const parsePort = (text: string): Result<number, string> => {
  const port = Number(text);
  return Number.isInteger(port) ? ok(port) : error(`not a port: ${text}`);
};

describe("Result", () => {
  it("should carry the value of an ok result", () => {
    expect(parsePort("8080")).to.deep.equal({ ok: true, value: 8080 });
  });

  it("should carry the error of a failed result", () => {
    const result = parsePort("eighty");
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error).to.equal("not a port: eighty");
    }
  });
});
