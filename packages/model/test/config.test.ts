import { afterEach, describe, expect, it, vi } from "vitest";

import {
  applyModelConfig,
  configureLogger,
  isPackageModelError,
  logger,
  PackageModelError,
  readDependencies,
  resetLogger,
  resolveModelConfig,
  toPackageModelError,
  usageError,
} from "../src/index.js";

describe("resolveModelConfig", () => {
  it("uses defaults with an empty environment", () => {
    const config = resolveModelConfig({ env: {} });

    expect(config).toEqual({
      cwd: process.cwd(),
      logLevel: "warn",
      color: true,
      json: false,
    });
  });

  it("reads the environment", () => {
    const config = resolveModelConfig({
      env: {
        ZKGMETA_LOG_LEVEL: "debug",
        ZKGMETA_LOG_JSON: "yes",
        ZKGMETA_CWD: "/srv/zeek",
        NO_COLOR: "1",
      },
    });

    expect(config).toEqual({
      cwd: "/srv/zeek",
      logLevel: "debug",
      color: false,
      json: true,
    });
  });

  it("prefers explicit options over the environment", () => {
    const config = resolveModelConfig({
      cwd: "/work",
      logLevel: "error",
      color: true,
      env: { ZKGMETA_LOG_LEVEL: "debug", ZKGMETA_CWD: "/srv/zeek", NO_COLOR: "1" },
    });

    expect(config.cwd).toBe("/work");
    expect(config.logLevel).toBe("error");
    expect(config.color).toBe(true);
  });

  it("ignores unknown log levels", () => {
    expect(resolveModelConfig({ env: { ZKGMETA_LOG_LEVEL: "trace" } }).logLevel).toBe("warn");
  });
});

describe("logger", () => {
  afterEach(() => {
    resetLogger();
    vi.restoreAllMocks();
  });

  it("stays silent below warn by default", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    readDependencies({ depends: "zeek" });
    logger.info("hidden");

    expect(write).not.toHaveBeenCalled();
  });

  it("writes debug lines once configured", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    applyModelConfig(resolveModelConfig({ logLevel: "debug", color: false, env: {} }));

    readDependencies({ depends: "zeek" });

    expect(write).toHaveBeenCalledWith('[debug] malformed dependency field {"field":"depends","value":"zeek"}\n');
  });

  it("writes JSON entries", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    configureLogger({ json: true });

    logger.warn("stale metadata", { source: "zeek" });

    const line = write.mock.calls[0]?.[0];
    expect(typeof line).toBe("string");
    const entry: unknown = JSON.parse(String(line));
    expect(entry).toMatchObject({ level: "warn", message: "stale metadata", data: { source: "zeek" } });
  });

  it("only writes errors when quiet", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    configureLogger({ quiet: true, noColor: true });

    logger.warn("hidden");
    logger.error("shown");

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith("error: shown\n");
  });
});

describe("PackageModelError", () => {
  it("carries a code and suggestion", () => {
    const error = usageError("bad input", "pass a name");

    expect(error).toBeInstanceOf(PackageModelError);
    expect(error.code).toBe("INVALID_ARGUMENT");
    expect(error.suggestion).toBe("pass a name");
    expect(isPackageModelError(error)).toBe(true);
  });

  it("recognizes structurally equal errors", () => {
    expect(isPackageModelError({ name: "PackageModelError", code: "NO_BEST_VERSION" })).toBe(true);
    expect(isPackageModelError(new Error("plain"))).toBe(false);
    expect(isPackageModelError("PackageModelError")).toBe(false);
  });

  it("wraps unknown throwables", () => {
    expect(toPackageModelError(new Error("boom")).code).toBe("INTERNAL_ERROR");
    expect(toPackageModelError("boom").code).toBe("UNKNOWN_ERROR");

    const original = usageError("kept");
    expect(toPackageModelError(original)).toBe(original);
  });
});
