import { describe, it, expect } from "vitest";
import { ensureCommandPrefix, parseJsonOutput } from "./cliInvoker.js";

function templates(strings: TemplateStringsArray, ..._expressions: unknown[]) {
  return strings;
}

describe("ensureCommandPrefix", () => {
  it("adds a missing prefix", () => {
    const result = ensureCommandPrefix(templates`group list`, "az");

    expect([...result]).toStrictEqual(["az group list"]);
    expect([...result.raw]).toStrictEqual(["az group list"]);
  });

  it("keeps an existing prefix", () => {
    const result = ensureCommandPrefix(templates`  terraform output -json`, "terraform");

    expect([...result]).toStrictEqual(["  terraform output -json"]);
  });

  it("only changes the first template", () => {
    const result = ensureCommandPrefix(templates`output -json -state=${"x"}`, "terraform");

    expect([...result]).toStrictEqual(["terraform output -json -state=", ""]);
  });
});

describe("parseJsonOutput", () => {
  it("parses json", () => expect(parseJsonOutput('{"external_ip":"1.2.3.4"}')).toStrictEqual({ external_ip: "1.2.3.4" }));
  it("blank is null", () => expect(parseJsonOutput("  \n")).toBeNull());
  it("invalid json throws", () => expect(() => parseJsonOutput("{")).toThrow(SyntaxError));
});
