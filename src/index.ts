import type { IConverter } from "./IConverter.js";
import type { ConversionResult, HtmlConverterConfig, HtmlConverterOptions, SourceType } from "./types.js";

export type { IConverter, ConversionResult, HtmlConverterConfig, HtmlConverterOptions, SourceType };
export { HtmlConverter } from "./HtmlConverter.js";
export { LocalFileConverter } from "./LocalFileConverter.js";
export { UrlDetector, DEFAULT_URL_PATTERNS } from "./UrlDetector.js";
export type { UrlPattern } from "./UrlDetector.js";
export { ConverterRegistry } from "./ConverterRegistry.js";
export { SourceConverter } from "./SourceConverter.js";
export type { SourceConverterOptions } from "./SourceConverter.js";
export { createHtmlConverterConfig, DEFAULT_HTML_CONVERTER_CONFIG, HtmlConverterConfigSchema } from "./config.js";
export { ConversionError, HttpStatusError } from "./errors.js";
export type { ConversionErrorCode, ConversionErrorDetails } from "./errors.js";
export { HtmlPreprocessor } from "./utils/html-preprocessor.js";
export { MarkdownPostprocessor } from "./utils/markdown-postprocessor.js";
export { MarkdownConverter } from "./utils/markdown-converter.js";
export type { MarkdownConverterOptions } from "./utils/markdown-converter.js";
export { isLocalFilePath } from "./utils/local-path.js";
