import { describe, expect, it } from "vitest";

import { UserVar, findSentenceEnd, normalizeVersionTag } from "../src/index.js";

describe("findSentenceEnd", () => {
  it("finds periods, exclamation and question marks", () => {
    expect(findSentenceEnd("Done. Next")).toBe(4);
    expect(findSentenceEnd("Really? Yes")).toBe(6);
    expect(findSentenceEnd("Fast!")).toBe(4);
  });

  it("ignores terminators inside words and numbers", () => {
    expect(findSentenceEnd("see zeek.org for 2.0 docs")).toBe(-1);
  });

  it("ignores ellipses and abbreviations", () => {
    expect(findSentenceEnd("Wait... cf. the docs. End")).toBe(20);
  });
});

describe("normalizeVersionTag", () => {
  it("strips a v before a digit", () => {
    expect(normalizeVersionTag("v1.2.3")).toBe("1.2.3");
  });

  it("keeps other tags", () => {
    expect(normalizeVersionTag("version-1")).toBe("version-1");
    expect(normalizeVersionTag("v")).toBe("v");
    expect(normalizeVersionTag("1.0")).toBe("1.0");
  });
});

describe("UserVar", () => {
  it("parses an empty field as no variables", () => {
    expect(UserVar.parseField("   ")).toEqual([]);
  });

  it("rejects trailing garbage", () => {
    expect(UserVar.parseField('FOO [bar] "Foo" BAZ')).toBeNull();
  });

  it("omits unset parts from entries", () => {
    expect(new UserVar("FOO").toEntry()).toEqual({ name: "FOO" });
  });

  it("parses command line overrides", () => {
    const parsed = UserVar.parseArg("FOO_ROOT=/opt/foo=bar");

    expect(parsed?.name).toBe("FOO_ROOT");
    expect(parsed?.value).toBe("/opt/foo=bar");
    expect(UserVar.parseArg("FOO_ROOT")).toBeNull();
    expect(UserVar.parseArg("=value")).toBeNull();
  });
});
