import type { ConversionResult } from "./types.js";

/**
 * Interface for converters that turn one kind of source into Markdown
 */
export interface IConverter {
  /** Human-readable converter name, used in logs and errors */
  readonly name: string;

  /**
   * Converts the source to Markdown
   * @param input A URL or a local path, already normalized by the caller
   * @returns A promise that resolves to a ConversionResult
   */
  convert(input: string): Promise<ConversionResult>;
}
