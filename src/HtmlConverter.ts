import { parse } from "node-html-parser";
import type { ConversionResult, HtmlConverterConfig, HtmlConverterOptions } from "./types.js";
import type { IConverter } from "./IConverter.js";

import { createHtmlConverterConfig } from "./config.js";
import { EMPTY_HTML_DOCUMENT_MARKER, HTML_CONTENT_TYPES, HTML_REQUEST_HEADERS } from "./constants.js";
import { ConversionError, HttpStatusError, toConversionError } from "./errors.js";
import { HtmlPreprocessor } from "./utils/html-preprocessor.js";
import { MarkdownConverter } from "./utils/markdown-converter.js";
import { MarkdownPostprocessor } from "./utils/markdown-postprocessor.js";

/**
 * HtmlConverter - Turns HTML pages into normalized Markdown.
 *
 * The pipeline strips unwanted elements from the markup, converts the rest with turndown and cleans
 * the resulting Markdown. `convert` fetches the page first with a single GET; it does not retry.
 */
export class HtmlConverter implements IConverter {
  public readonly name = "HTML";

  private readonly config: HtmlConverterConfig;
  private readonly options: Required<HtmlConverterOptions>;
  private readonly preprocessor: HtmlPreprocessor;
  private readonly markdownConverter: MarkdownConverter;
  private readonly postprocessor: MarkdownPostprocessor;

  private static readonly DEFAULT_OPTIONS: Required<HtmlConverterOptions> = {
    headers: {},
  };

  /**
   * @param config Converter config overrides; validated, defaults filled in.
   * @param options Request options applied to every `convert` call.
   * @throws {ConversionError} ERR_INVALID_CONFIG for invalid config overrides.
   */
  constructor(config: Partial<HtmlConverterConfig> = {}, options: HtmlConverterOptions = {}) {
    this.config = createHtmlConverterConfig(config);
    this.options = { ...HtmlConverter.DEFAULT_OPTIONS, ...options };
    this.preprocessor = new HtmlPreprocessor(this.config);
    this.markdownConverter = new MarkdownConverter({ maxLineWidth: this.config.maxLineWidth });
    this.postprocessor = new MarkdownPostprocessor(this.config);
  }

  public getConfig(): HtmlConverterConfig {
    return this.config;
  }

  /**
   * Converts an HTML string to clean Markdown.
   *
   * @throws {ConversionError} ERR_EMPTY_CONTENT when the HTML is empty or whitespace only.
   */
  public convertHtml(html: string): string {
    if (!html.trim()) {
      throw new ConversionError(
        `HTML content cannot be empty (received ${html.length} characters of whitespace/empty content)`,
        "ERR_EMPTY_CONTENT"
      );
    }

    const sanitized = this.preprocessor.preprocess(html);
    const rawMarkdown = this.markdownConverter.convert(sanitized);
    return this.postprocessor.postprocess(rawMarkdown);
  }

  /**
   * Returns the document's `<title>`, falling back to its `og:title` meta tag.
   */
  public extractTitle(html: string): string | null {
    const root = parse(html);
    return (
      root.querySelector("title")?.text.trim() ||
      root.querySelector("meta[property='og:title']")?.getAttribute("content")?.trim() ||
      null
    );
  }

  /**
   * Fetches the page at `url` and converts it to Markdown.
   *
   * @throws {HttpStatusError} If the HTTP response status is not ok (e.g., 404, 500).
   * @throws {ConversionError} ERR_NON_HTML_CONTENT for non-HTML responses, ERR_FETCH_FAILED for network errors.
   */
  async convert(url: string, options?: HtmlConverterOptions): Promise<ConversionResult> {
    try {
      // Call headers override constructor headers, which override the defaults
      const finalHeaders = {
        ...HTML_REQUEST_HEADERS,
        ...this.options.headers,
        ...options?.headers,
      };

      const response = await fetch(url, {
        redirect: "follow",
        headers: finalHeaders,
      });

      if (!response.ok) {
        throw new HttpStatusError(`HTTP error! status: ${response.status}`, response.status);
      }

      const contentTypeHeader = response.headers.get("content-type");
      if (!contentTypeHeader || !HTML_CONTENT_TYPES.some((type) => contentTypeHeader.includes(type))) {
        throw new ConversionError(
          `Content-Type is not HTML: ${contentTypeHeader ?? "(missing)"}`,
          "ERR_NON_HTML_CONTENT",
          undefined,
          response.status
        );
      }

      const html = await response.text();
      const markdown = this.convertHtml(html);

      return {
        content: markdown.trim() ? markdown : EMPTY_HTML_DOCUMENT_MARKER,
        title: this.extractTitle(html),
        url: response.url || url,
        sourceType: "html",
        statusCode: response.status,
      };
    } catch (error: unknown) {
      if (error instanceof ConversionError) {
        throw error;
      }
      console.warn(`HtmlConverter: Fetch failed for ${url}:`, error);
      throw toConversionError(error, "ERR_FETCH_FAILED", "Fetch failed");
    }
  }
}
