import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger, isLogLevel } from "../src/utils/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  it("should prefix scoped children with their component", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    new Logger("info").child("gateway").child("rpc").info("connected");

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\[.+\] \[INFO \] \[gateway:rpc\] connected$/);
  });

  it("should serialise bigint and Error arguments", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    new Logger("debug").warn("fee", { executionFee: 325n }, new Error("boom"));

    expect(warn.mock.calls[0][0]).toMatch(
      /fee \[\{"executionFee":"325"\},\{"name":"Error","message":"boom"\}\]$/
    );
  });

  it("should drop messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    new Logger("warn").debug("hidden");

    expect(debug).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("should only accept known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
