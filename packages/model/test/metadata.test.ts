import { describe, expect, it } from "vitest";

import {
  aliases,
  dependencies,
  isDependencyField,
  readAllDependencies,
  readDependencies,
  readUserVars,
  shortDescription,
  tags,
  userVars,
} from "../src/index.js";

describe("aliases", () => {
  it("splits on commas and whitespace", () => {
    expect(aliases({ aliases: "a, b c" })).toEqual(["a", "b", "c"]);
    expect(aliases({ aliases: "zeek-af_packet,af_packet\n  afpacket" })).toEqual([
      "zeek-af_packet",
      "af_packet",
      "afpacket",
    ]);
  });

  it("returns an empty list when the field is absent", () => {
    expect(aliases({})).toEqual([]);
  });

  it("drops empty items from trailing separators", () => {
    expect(aliases({ aliases: "a, b," })).toEqual(["a", "b"]);
  });
});

describe("tags", () => {
  it("splits on commas only", () => {
    expect(tags({ tags: "zeek plugin, protocol analyzer,dns" })).toEqual([
      "zeek plugin",
      "protocol analyzer",
      "dns",
    ]);
  });

  it("returns an empty list when the field is absent", () => {
    expect(tags({ description: "no tags here" })).toEqual([]);
  });
});

describe("shortDescription", () => {
  it("returns the first sentence with line breaks folded", () => {
    expect(shortDescription({ description: "This is\na test. More text." })).toBe("This is a test.");
  });

  it("left-trims continuation lines", () => {
    expect(shortDescription({ description: "Parses   \n     Modbus traffic! Then more." })).toBe(
      "Parses    Modbus traffic!",
    );
  });

  it("returns the whole description when no sentence ends", () => {
    expect(shortDescription({ description: "A plugin\nfor version 1.0 of zeek.org" })).toBe(
      "A plugin for version 1.0 of zeek.org",
    );
  });

  it("skips abbreviations and ellipses", () => {
    expect(shortDescription({ description: "Adds filters, e.g. for DNS... and more. Second." })).toBe(
      "Adds filters, e.g. for DNS... and more.",
    );
  });

  it("returns an empty string when the field is absent", () => {
    expect(shortDescription({})).toBe("");
  });
});

describe("dependencies", () => {
  it("pairs names with version specs", () => {
    expect(dependencies({ depends: "zeek >=4.0.0 foo *" })).toEqual({
      zeek: ">=4.0.0",
      foo: "*",
    });
  });

  it("accepts pairs spread over several lines", () => {
    expect(dependencies({ depends: "\n  zkg >=2.0\n  https://example.com/org/bar branch=main\n" })).toEqual({
      zkg: ">=2.0",
      "https://example.com/org/bar": "branch=main",
    });
  });

  it("returns the malformed marker for an odd token count", () => {
    expect(dependencies({ depends: "zeek" })).toBeNull();
    expect(readDependencies({ depends: "zeek" })).toEqual({
      status: "malformed",
      reason: '"depends" has 1 tokens, expected name/spec pairs',
    });
  });

  it("tells absent and malformed fields apart", () => {
    expect(dependencies({})).toEqual({});
    expect(readDependencies({})).toEqual({ status: "absent" });
  });

  it("ignores inherited properties", () => {
    expect(readDependencies({}, "constructor")).toEqual({ status: "absent" });
    expect(dependencies({}, "toString")).toEqual({});
  });

  it("reads other dependency fields by name", () => {
    expect(dependencies({ suggests: "foo >=1.0.0" }, "suggests")).toEqual({ foo: ">=1.0.0" });
    expect(dependencies({ suggests: "foo >=1.0.0" })).toEqual({});
  });

  it("lets later duplicates win", () => {
    expect(dependencies({ depends: "foo >=1.0.0 foo <3.0.0" })).toEqual({ foo: "<3.0.0" });
  });

  it("reads every dependency class field at once", () => {
    const result = readAllDependencies({
      depends: "zeek >=5.0.0",
      external_depends: "libpcap",
    });

    expect(result.depends).toEqual({ status: "present", value: { zeek: ">=5.0.0" } });
    expect(result.suggests).toEqual({ status: "absent" });
    expect(result.external_depends.status).toBe("malformed");
  });

  it("recognizes dependency field names", () => {
    expect(isDependencyField("suggests")).toBe(true);
    expect(isDependencyField("tags")).toBe(false);
  });
});

describe("userVars", () => {
  it("parses name, default and description", () => {
    expect(
      userVars({
        user_vars: 'LIBRDKAFKA_ROOT [/usr] "Path to librdkafka"\n  KAFKA_DEBUG [] "Extra debug flags"',
      }),
    ).toEqual([
      { name: "LIBRDKAFKA_ROOT", value: "/usr", description: "Path to librdkafka" },
      { name: "KAFKA_DEBUG", value: "", description: "Extra debug flags" },
    ]);
  });

  it("returns an empty list when the field is absent", () => {
    expect(userVars({})).toEqual([]);
    expect(readUserVars({})).toEqual({ status: "absent" });
  });

  it("returns the malformed marker for unparseable entries", () => {
    expect(userVars({ user_vars: "LIBRDKAFKA_ROOT /usr" })).toBeNull();
    expect(readUserVars({ user_vars: "LIBRDKAFKA_ROOT /usr" }).status).toBe("malformed");
  });
});
