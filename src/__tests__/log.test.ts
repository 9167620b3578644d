import { afterEach, describe, expect, test, vi } from "vitest";
import { formatFields, getLogLevel, log, setLogLevel } from "../log.ts";

describe("formatFields", () => {
  test("renders key=value pairs in insertion order", () => {
    expect(formatFields({ method: "GET", status: 404 })).toBe(" method=GET status=404");
  });

  test("quotes strings containing whitespace", () => {
    expect(formatFields({ path: "/a b" })).toBe(' path="/a b"');
  });

  test("renders errors by their message and skips undefined", () => {
    expect(formatFields({ error: new Error("boom"), missing: undefined })).toBe(' error="boom"');
  });

  test("renders bigints as decimals", () => {
    expect(formatFields({ id: 123n })).toBe(" id=123");
  });
});

describe("log", () => {
  afterEach(() => {
    setLogLevel("warning");
    vi.restoreAllMocks();
  });

  test("defaults to warning", () => {
    expect(getLogLevel()).toBe("warning");
  });

  test("drops messages below the threshold", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown", { file: "/tmp/key.json" });

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith("warning: shown file=/tmp/key.json");
  });

  test("emits debug when the threshold is lowered", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    setLogLevel("debug");

    log.debug("visible");

    expect(debugSpy).toHaveBeenCalledWith("debug: visible");
  });

  test("routes errors to console.error", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    log.error("failed", { error: new Error("nope") });

    expect(errorSpy).toHaveBeenCalledWith('error: failed error="nope"');
  });
});
