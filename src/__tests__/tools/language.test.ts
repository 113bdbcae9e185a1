/**
 * Tests for tool-boundary language coercion
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { resolveLanguage } from "@/tools/language";

describe("resolveLanguage", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("returns the fallback when no code is given", () => {
    expect(resolveLanguage(undefined, "zh")).toBe("zh");
    expect(console.warn).not.toHaveBeenCalled();
  });

  test("trims and lower-cases known codes", () => {
    expect(resolveLanguage(" JA ", "en")).toBe("ja");
    expect(console.warn).not.toHaveBeenCalled();
  });

  test("falls back with a warning for unknown codes", () => {
    expect(resolveLanguage("xx", "fr")).toBe("fr");
    expect(console.warn).toHaveBeenCalledWith(
      '[destinations] Unknown language code "xx", using "fr" instead',
    );
  });
});
