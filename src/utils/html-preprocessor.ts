import { AD_CLASSES, NAVIGATION_CLASSES, SIDEBAR_CLASSES } from "../constants.js";
import type { HtmlConverterConfig } from "../types.js";

type StripperToggles = Pick<
  HtmlConverterConfig,
  "removeScriptsStyles" | "removeNavigation" | "removeSidebars" | "removeAds"
>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Removes whole elements (scripts, styles, navigation, sidebars, ads) from raw markup.
 *
 * Works on the HTML text rather than a parsed tree so that everything it does not remove stays
 * byte-for-byte identical. Each enabled category runs in a fixed order on the previous output:
 * scripts/styles, navigation, sidebars, ads. Unterminated tags are left in place, except that the class
 * fallback drops the opening tag of any unclosed or self-closed `class="name"` element the regex left behind.
 */
export class HtmlPreprocessor {
  constructor(private readonly config: StripperToggles) {}

  public preprocess(html: string): string {
    let cleaned = html;

    if (this.config.removeScriptsStyles) {
      cleaned = this.removeScriptsAndStyles(cleaned);
    }
    if (this.config.removeNavigation) {
      cleaned = this.removeNavigationElements(cleaned);
    }
    if (this.config.removeSidebars) {
      cleaned = this.removeSidebarElements(cleaned);
    }
    if (this.config.removeAds) {
      cleaned = this.removeAdvertisementElements(cleaned);
    }

    return cleaned;
  }

  public removeScriptsAndStyles(html: string): string {
    return this.removeElementsByTag(this.removeElementsByTag(html, "script"), "style");
  }

  public removeNavigationElements(html: string): string {
    let result = this.removeElementsByTag(html, "nav");
    for (const className of NAVIGATION_CLASSES) {
      result = this.removeElementsByClass(result, className);
    }
    return result;
  }

  public removeSidebarElements(html: string): string {
    let result = this.removeElementsByTag(html, "aside");
    for (const className of SIDEBAR_CLASSES) {
      result = this.removeElementsByClass(result, className);
    }
    return result;
  }

  public removeAdvertisementElements(html: string): string {
    let result = html;
    for (const className of AD_CLASSES) {
      result = this.removeElementsByClass(result, className);
    }
    return result;
  }

  // <tag ...>...</tag> or <tag .../>, case-insensitive, across lines.
  private removeElementsByTag(html: string, tagName: string): string {
    const tag = escapeRegExp(tagName);
    let pattern: RegExp;
    try {
      pattern = new RegExp(`<${tag}(?:\\s[^>]*)?>[\\s\\S]*?</${tag}>|<${tag}(?:\\s[^>]*)?/>`, "gi");
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      console.warn(`HtmlPreprocessor: Skipping removal of <${tagName}> elements: ${message}`);
      return html;
    }
    return html.replace(pattern, "");
  }

  // Any element whose class attribute holds `className` as a whole word, through its matching close tag.
  private removeElementsByClass(html: string, className: string): string {
    let pattern: RegExp;
    try {
      pattern = new RegExp(
        `<(\\w+)[^>]*class\\s*=\\s*["'][^"']*\\b${escapeRegExp(className)}\\b[^"']*["'][^>]*>[\\s\\S]*?</\\1>`,
        "gi"
      );
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      console.warn(`HtmlPreprocessor: Falling back to manual scan for class "${className}": ${message}`);
      return this.removeElementsByClassFallback(html, className);
    }

    const result = html.replace(pattern, "");
    if (result.includes(`class="${className}"`)) {
      return this.removeElementsByClassFallback(result, className);
    }
    return result;
  }

  /**
   * Manual scan for a literal `class="name"`: excises the enclosing element up to the first matching
   * close tag, or only the opening tag when no close tag follows.
   */
  private removeElementsByClassFallback(html: string, className: string): string {
    const needle = `class="${className}"`;
    let result = html;
    let classPos = result.indexOf(needle);

    while (classPos !== -1) {
      const tagStart = Math.max(result.lastIndexOf("<", classPos), 0);
      const gt = result.indexOf(">", classPos + needle.length);
      if (gt === -1) {
        break;
      }
      const tagEnd = gt + 1;

      const tagNameMatch = /^<([A-Za-z][\w-]*)/.exec(result.slice(tagStart, tagEnd));
      let removeEnd = tagEnd;
      if (tagNameMatch) {
        const closing = new RegExp(`</${escapeRegExp(tagNameMatch[1])}\\s*>`, "i").exec(result.slice(tagEnd));
        if (closing) {
          removeEnd = tagEnd + closing.index + closing[0].length;
        }
      }

      result = result.slice(0, tagStart) + result.slice(removeEnd);
      classPos = result.indexOf(needle);
    }

    return result;
  }
}
