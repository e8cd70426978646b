import { z } from "zod";
import { ConversionError } from "./errors.js";
import type { HtmlConverterConfig } from "./types.js";

export const HtmlConverterConfigSchema = z
  .object({
    maxLineWidth: z.number().int().nonnegative().default(120),
    removeScriptsStyles: z.boolean().default(true),
    removeNavigation: z.boolean().default(true),
    removeSidebars: z.boolean().default(true),
    removeAds: z.boolean().default(true),
    maxBlankLines: z.number().int().nonnegative().default(2),
  })
  .strict();

export const DEFAULT_HTML_CONVERTER_CONFIG: HtmlConverterConfig = Object.freeze(HtmlConverterConfigSchema.parse({}));

/**
 * Builds a frozen converter config from partial overrides.
 *
 * @throws {ConversionError} ERR_INVALID_CONFIG when an override has the wrong type or range.
 */
export function createHtmlConverterConfig(overrides: Partial<HtmlConverterConfig> = {}): HtmlConverterConfig {
  const parsed = HtmlConverterConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConversionError(`Invalid HTML converter config: ${details}`, "ERR_INVALID_CONFIG", parsed.error);
  }
  return Object.freeze(parsed.data);
}
