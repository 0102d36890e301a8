// apps/cli/src/output/__tests__/reporters.test.ts
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import * as reporters from "../reporters.js";
import { configureOutput, info, json, keyValue, setJsonMode, success } from "../reporters.js";

describe("reporters", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    configureOutput({ format: "table", colors: false });
    setJsonMode(false);
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it("writes human output to stdout by default", () => {
    success("Added L1000");
    keyValue("Added", "2", 1);

    expect(consoleLogSpy).toHaveBeenNthCalledWith(1, "✓ Added L1000");
    expect(consoleLogSpy).toHaveBeenNthCalledWith(2, "  Added: 2");
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it("moves human output to stderr once the config asks for JSON", () => {
    configureOutput({ format: "json", colors: false });

    info("Loaded 3 lemmas");
    json({ ids: ["L1000"] });

    expect(consoleErrorSpy).toHaveBeenCalledWith("i Loaded 3 lemmas");
    expect(consoleLogSpy).toHaveBeenCalledWith('{\n  "ids": [\n    "L1000"\n  ]\n}');
  });

  it("exposes only the reporters the commands use", () => {
    expect(Object.keys(reporters).sort()).toEqual([
      "configureOutput",
      "error",
      "header",
      "info",
      "json",
      "keyValue",
      "listItem",
      "newline",
      "setJsonMode",
      "spinner",
      "success",
      "warning",
    ]);
  });
});
