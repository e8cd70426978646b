import type { IConverter } from "./IConverter.js";
import type { ConversionResult, HtmlConverterConfig, SourceType } from "./types.js";

import { ConverterRegistry } from "./ConverterRegistry.js";
import { ConversionError } from "./errors.js";
import { HtmlConverter } from "./HtmlConverter.js";
import { LocalFileConverter } from "./LocalFileConverter.js";
import { UrlDetector } from "./UrlDetector.js";

export interface SourceConverterOptions {
  /** Overrides for the HTML converter config. */
  config?: Partial<HtmlConverterConfig>;
  /** Headers sent with every remote request. */
  headers?: Record<string, string>;
  /** Detector used to classify inputs. Defaults to one with the built-in patterns. */
  detector?: UrlDetector;
}

/**
 * SourceConverter - Single entry point for URLs and local paths.
 *
 * Detects what kind of source an input is, then hands it to the converter registered for that type.
 * HTML pages and local files are handled out of the box; other types need a converter from `register`.
 */
export class SourceConverter {
  private readonly registry = new ConverterRegistry();
  private readonly detector: UrlDetector;

  constructor(options: SourceConverterOptions = {}) {
    this.detector = options.detector ?? new UrlDetector();
    this.registry
      .register("html", new HtmlConverter(options.config, { headers: options.headers ?? {} }))
      .register("localFile", new LocalFileConverter());
  }

  register(sourceType: SourceType, converter: IConverter): this {
    this.registry.register(sourceType, converter);
    return this;
  }

  supportedTypes(): SourceType[] {
    return this.registry.supportedTypes();
  }

  /**
   * @throws {ConversionError} ERR_INVALID_URL for unrecognized input, ERR_UNSUPPORTED_SOURCE when no converter
   * handles the detected type, plus whatever the chosen converter throws.
   */
  async convert(input: string): Promise<ConversionResult> {
    const sourceType = this.detector.detectType(input);
    const converter = this.registry.get(sourceType);
    if (!converter) {
      throw new ConversionError(
        `No converter registered for ${sourceType} sources: ${input.trim()}`,
        "ERR_UNSUPPORTED_SOURCE"
      );
    }

    const target = sourceType === "localFile" ? input.trim() : this.detector.normalizeUrl(input);
    return converter.convert(target);
  }
}
