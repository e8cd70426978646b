import { readFile, stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import type { ConversionResult } from "./types.js";
import type { IConverter } from "./IConverter.js";

import { REGEX_ATX_HEADING_TEXT } from "./constants.js";
import { ConversionError, toConversionError } from "./errors.js";

function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * LocalFileConverter - Reads Markdown or text files from disk.
 *
 * Accepts plain paths (`/abs/doc.md`, `./doc.md`, `notes.md`) and `file://` URLs. The file content is
 * returned as-is; it is already Markdown.
 */
export class LocalFileConverter implements IConverter {
  public readonly name = "Local File";

  /**
   * Strips the `file://` scheme: `file:///abs/doc.md` becomes `/abs/doc.md`, `file://./doc.md` becomes `./doc.md`.
   */
  public normalizePath(input: string): string {
    const trimmed = input.trim();
    if (trimmed.startsWith("file:///")) {
      return `/${trimmed.slice("file:///".length)}`;
    }
    if (trimmed.startsWith("file://")) {
      return trimmed.slice("file://".length);
    }
    return trimmed;
  }

  async convert(input: string): Promise<ConversionResult> {
    const filePath = this.normalizePath(input);

    let stats: Stats;
    try {
      stats = await stat(filePath);
    } catch (error: unknown) {
      if (isMissingPathError(error)) {
        throw new ConversionError(
          `File does not exist: ${filePath}`,
          "ERR_FILE_NOT_FOUND",
          error instanceof Error ? error : undefined
        );
      }
      throw toConversionError(error, "ERR_READ_FAILED", `Cannot access ${filePath}`);
    }

    if (!stats.isFile()) {
      throw new ConversionError(`Path is not a file: ${filePath}`, "ERR_NOT_A_FILE");
    }

    let content: string;
    try {
      content = await readFile(filePath, "utf8");
    } catch (error: unknown) {
      throw toConversionError(error, "ERR_READ_FAILED", `Failed to read ${filePath}`);
    }

    if (!content.trim()) {
      throw new ConversionError(`File content is empty: ${filePath}`, "ERR_EMPTY_CONTENT");
    }

    const heading = REGEX_ATX_HEADING_TEXT.exec(content);

    return {
      content,
      title: heading ? heading[1] : null,
      url: filePath,
      sourceType: "localFile",
      statusCode: undefined,
    };
  }
}
