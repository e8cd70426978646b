import type { HtmlConverterConfig } from "../types.js";

const EMPTY_TEXT_LINK_OPEN = "[](";
const LINK_MIDDLE = "](";
const MAX_HEADING_DEPTH = 6;

/**
 * Cleans raw Markdown produced by the HTML→Markdown core.
 *
 * Passes run in a fixed order: whitespace normalization, blank-line collapsing, malformed-link cleanup,
 * heading-hierarchy repair, and a final trim. None of them throw.
 */
export class MarkdownPostprocessor {
  constructor(private readonly config: Pick<HtmlConverterConfig, "maxBlankLines">) {}

  public postprocess(markdown: string): string {
    let cleaned = this.normalizeWhitespace(markdown);
    cleaned = this.removeExcessiveBlankLines(cleaned);
    cleaned = this.cleanMalformedLinks(cleaned);
    cleaned = this.fixHeadingHierarchy(cleaned);
    return cleaned.trim();
  }

  /**
   * Collapses each run of spaces and tabs into a single space. Line breaks (`\n`, `\r`) pass through
   * unchanged and end the run.
   */
  public normalizeWhitespace(markdown: string): string {
    let result = "";
    let inWhitespace = false;

    for (const ch of markdown) {
      if (ch === " " || ch === "\t") {
        if (!inWhitespace) {
          result += " ";
          inWhitespace = true;
        }
      } else {
        result += ch;
        inWhitespace = false;
      }
    }

    return result;
  }

  /**
   * Keeps at most `maxBlankLines` consecutive blank lines; shorter runs are left as they are.
   */
  public removeExcessiveBlankLines(markdown: string): string {
    const kept: string[] = [];
    let consecutiveBlanks = 0;

    for (const line of markdown.split("\n")) {
      if (line.trim() === "") {
        consecutiveBlanks++;
        if (consecutiveBlanks <= this.config.maxBlankLines) {
          kept.push(line);
        }
      } else {
        consecutiveBlanks = 0;
        kept.push(line);
      }
    }

    return kept.join("\n");
  }

  /**
   * Drops `[](target)` links whose target is not http(s) and `[text]()` links with a blank target,
   * each with one trailing space.
   */
  public cleanMalformedLinks(markdown: string): string {
    return this.removeEmptyUrlLinks(this.removeEmptyTextLinks(markdown));
  }

  private removeEmptyTextLinks(markdown: string): string {
    let cleaned = markdown;
    let start = cleaned.indexOf(EMPTY_TEXT_LINK_OPEN);

    while (start !== -1) {
      const urlStart = start + EMPTY_TEXT_LINK_OPEN.length;
      const close = cleaned.indexOf(")", urlStart);
      if (close === -1) {
        break;
      }
      const url = cleaned.slice(urlStart, close);
      if (url.startsWith("http://") || url.startsWith("https://")) {
        // An http(s) placeholder ends this pass; later empty-text links are left alone.
        break;
      }
      cleaned = cleaned.slice(0, start) + cleaned.slice(this.endWithTrailingSpace(cleaned, close + 1));
      start = cleaned.indexOf(EMPTY_TEXT_LINK_OPEN);
    }

    return cleaned;
  }

  private removeEmptyUrlLinks(markdown: string): string {
    let cleaned = markdown;
    let cursor = 0;

    for (;;) {
      const middle = cleaned.indexOf(LINK_MIDDLE, cursor);
      if (middle === -1) {
        break;
      }
      const urlStart = middle + LINK_MIDDLE.length;
      const close = cleaned.indexOf(")", urlStart);
      if (close === -1) {
        break;
      }

      const openBracket = cleaned.lastIndexOf("[", middle);
      if (openBracket === -1 || cleaned.slice(urlStart, close).trim() !== "") {
        cursor = close + 1;
        continue;
      }

      cleaned = cleaned.slice(0, openBracket) + cleaned.slice(this.endWithTrailingSpace(cleaned, close + 1));
      cursor = openBracket;
    }

    return cleaned;
  }

  private endWithTrailingSpace(text: string, end: number): number {
    return text.charAt(end) === " " ? end + 1 : end;
  }

  /**
   * Rewrites ATX heading markers so depth never grows by more than one level at a time.
   *
   * The first heading becomes H1 and its raw depth is the reference: later headings at or above the
   * reference restart at H1, deeper jumps advance one level, and headings climbing back up keep their
   * depth relative to the reference.
   */
  public fixHeadingHierarchy(markdown: string): string {
    let currentLevel = 0;
    let referenceLevel: number | null = null;

    return markdown
      .split("\n")
      .map((line) => {
        const trimmed = line.trim();
        const hashes = this.countLeadingHashes(trimmed);
        if (hashes === 0 || hashes > MAX_HEADING_DEPTH) {
          return line;
        }

        let targetLevel: number;
        if (referenceLevel === null) {
          referenceLevel = hashes;
          targetLevel = 1;
        } else if (hashes <= referenceLevel) {
          targetLevel = 1;
        } else if (hashes > currentLevel) {
          targetLevel = currentLevel + 1;
        } else {
          targetLevel = hashes - referenceLevel + 1;
        }
        currentLevel = targetLevel;

        return `${"#".repeat(targetLevel)} ${trimmed.slice(hashes).trimStart()}`;
      })
      .join("\n");
  }

  private countLeadingHashes(text: string): number {
    let count = 0;
    while (count < text.length && text[count] === "#") {
      count++;
    }
    return count;
  }
}
