/**
 * Options shared by the element stripper, the HTML→Markdown core and the postprocessor.
 * Build instances with `createHtmlConverterConfig`, which validates and freezes them.
 */
export interface HtmlConverterConfig {
  /**
   * Wrap width for plain paragraph lines produced by the HTML→Markdown core. `0` disables wrapping.
   * @default 120
   */
  readonly maxLineWidth: number;
  /**
   * Remove `<script>` and `<style>` elements before conversion.
   * @default true
   */
  readonly removeScriptsStyles: boolean;
  /**
   * Remove `<nav>` elements and elements classed `nav` / `navigation`.
   * @default true
   */
  readonly removeNavigation: boolean;
  /**
   * Remove `<aside>` elements and elements classed `sidebar` / `side-bar`.
   * @default true
   */
  readonly removeSidebars: boolean;
  /**
   * Remove elements classed `ad`, `ads` or `advertisement`.
   * @default true
   */
  readonly removeAds: boolean;
  /**
   * Maximum number of consecutive blank lines kept in the final Markdown.
   * @default 2
   */
  readonly maxBlankLines: number;
}

/**
 * Kinds of input the converter layer can route.
 */
export type SourceType = "html" | "googleDocs" | "githubIssue" | "localFile";

/**
 * Result of converting one source to Markdown.
 */
export interface ConversionResult {
  /** The normalized Markdown. */
  content: string;
  /** Title of the document, if one could be found. */
  title: string | null;
  /** The final URL after redirects, or the resolved file path for local files. */
  url: string;
  /** Which converter produced the result. */
  sourceType: SourceType;
  /** HTTP status code of the final response; undefined for local files. */
  statusCode: number | undefined;
}

/**
 * Options for HtmlConverter, either at construction or per call.
 */
export interface HtmlConverterOptions {
  /** Optional headers to include in the request. */
  headers?: Record<string, string>;
}
