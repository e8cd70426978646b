import { describe, it, expect } from "vitest";
import { createHtmlConverterConfig, DEFAULT_HTML_CONVERTER_CONFIG, HtmlConverterConfigSchema } from "../src/config.js";
import { ConversionError } from "../src/errors.js";

describe("createHtmlConverterConfig", () => {
  it("fills in defaults", () => {
    expect(createHtmlConverterConfig()).toEqual({
      maxLineWidth: 120,
      removeScriptsStyles: true,
      removeNavigation: true,
      removeSidebars: true,
      removeAds: true,
      maxBlankLines: 2,
    });
    expect(DEFAULT_HTML_CONVERTER_CONFIG).toEqual(createHtmlConverterConfig());
  });

  it("applies overrides over defaults and freezes the result", () => {
    const config = createHtmlConverterConfig({ removeAds: false, maxBlankLines: 0 });
    expect(config.removeAds).toBe(false);
    expect(config.maxBlankLines).toBe(0);
    expect(config.removeNavigation).toBe(true);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects negative and fractional numbers", () => {
    expect(() => createHtmlConverterConfig({ maxBlankLines: -1 })).toThrow(ConversionError);
    expect(() => createHtmlConverterConfig({ maxLineWidth: 1.5 })).toThrow(/maxLineWidth/);
  });

  it("reports ERR_INVALID_CONFIG", () => {
    let caught: unknown;
    try {
      createHtmlConverterConfig({ maxBlankLines: -1 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConversionError);
    expect(caught).toMatchObject({ code: "ERR_INVALID_CONFIG" });
  });

  it("rejects unknown keys", () => {
    expect(HtmlConverterConfigSchema.safeParse({ maxWidth: 80 }).success).toBe(false);
  });
});
