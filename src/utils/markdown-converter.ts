import TurndownService from "turndown";
import { gfm } from "turndown-plugin-gfm";
import { parse, type HTMLElement as NHPHTMLElement } from "node-html-parser";

// --- Constants ---

// Form controls and media never carry readable text
const UNWANTED_TAGS: Array<keyof HTMLElementTagNameMap> = [
  "noscript",
  "iframe",
  "button",
  "input",
  "select",
  "textarea",
  "form",
  "canvas",
  "audio",
  "video",
];

const CODE_BLOCK_LANG_PREFIXES: ReadonlyArray<string> = ["language-", "lang-"];

// Lines starting like this are structural Markdown and are never wrapped
const UNWRAPPABLE_LINE = /^(\s|#|>|\||[-*+]\s|\d+[.)]\s|```|~~~|---|!\[)/;
const FENCE_LINE = /^\s*(```|~~~)/;
// A wrapped line starting with one of these would read as a heading, list item or quote
const BLOCK_MARKER_WORD = /^(#|>|[-*+]$|\d+[.)]$)/;

const TURNDOWN_NODE_ELEMENT_TYPE = 1;

// --- Types ---

export interface MarkdownConverterOptions {
  /** Wrap plain paragraph lines longer than this many characters. `0` disables wrapping. */
  maxLineWidth?: number;
}

type TurndownNode = Node;
type TurndownHTMLElement = HTMLElement;

function isElement(node: TurndownNode): node is TurndownHTMLElement {
  return node.nodeType === TURNDOWN_NODE_ELEMENT_TYPE;
}

// --- Class Definition ---

/**
 * HTML→Markdown core: turndown with GFM tables plus a few rules for links, images and code.
 * Input is expected to be sanitized already; output is raw Markdown for the postprocessor.
 */
export class MarkdownConverter {
  private readonly turndownService: TurndownService;
  private readonly maxLineWidth: number;

  constructor(options: MarkdownConverterOptions = {}) {
    this.maxLineWidth = options.maxLineWidth ?? 0;
    this.turndownService = new TurndownService({
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      bulletListMarker: "-",
      strongDelimiter: "**",
      emDelimiter: "*",
      hr: "---",
    });

    this.turndownService.use(gfm);

    this.addRemovalRules();
    this.addInlineRules();
    this.addCodeRules();
  }

  // --- Public Method ---

  /**
   * Converts HTML to raw Markdown.
   * @param html Sanitized HTML (a fragment or a full document).
   */
  public convert(html: string): string {
    const prepared = this.prepareHtml(html);
    const markdown = this.turndownService.turndown(prepared);
    return this.maxLineWidth > 0 ? this.wrapParagraphs(markdown, this.maxLineWidth) : markdown;
  }

  // --- Turndown Rule Setup ---

  private addRemovalRules(): void {
    this.turndownService.addRule("remove-unwanted", {
      filter: UNWANTED_TAGS,
      replacement: () => "",
    });
  }

  private addInlineRules(): void {
    // Empty link text stays empty so the postprocessor can judge the link
    this.turndownService.addRule("link", {
      filter: (node: TurndownNode): boolean => {
        return isElement(node) && node.nodeName === "A" && node.getAttribute("href") !== null;
      },
      replacement: (content: string, node: TurndownNode) => {
        if (!isElement(node)) return content;
        const href = node.getAttribute("href") ?? "";
        const title = node.getAttribute("title");
        const text = content.trim();
        return title ? `[${text}](${href} "${title}")` : `[${text}](${href})`;
      },
    });

    this.turndownService.addRule("image", {
      filter: (node: TurndownNode): boolean => {
        return isElement(node) && node.nodeName === "IMG" && !!node.getAttribute("src");
      },
      replacement: (_content: string, node: TurndownNode) => {
        if (!isElement(node)) return "";
        const src = node.getAttribute("src") ?? "";
        const alt = node.getAttribute("alt") ?? "";
        const title = node.getAttribute("title");
        return title ? `![${alt}](${src} "${title}")` : `![${alt}](${src})`;
      },
    });
  }

  private addCodeRules(): void {
    this.turndownService.addRule("code-block", {
      filter: (node: TurndownNode): boolean => {
        return isElement(node) && node.nodeName === "PRE";
      },
      replacement: (_content: string, node: TurndownNode) => {
        if (!isElement(node)) return "";
        const codeElement = node.querySelector("code");
        const language = this.detectCodeLanguage(node, codeElement);
        const code = (codeElement ?? node).textContent ?? "";
        return `\n\n\`\`\`${language}\n${code.replace(/^\n+|\n+$/g, "")}\n\`\`\`\n\n`;
      },
    });

    this.turndownService.addRule("inline-code", {
      filter: (node: TurndownNode) => node.nodeName === "CODE" && node.parentNode?.nodeName !== "PRE",
      replacement: (content: string) => {
        const trimmed = content.trim();
        if (!trimmed) return "";
        if (!trimmed.includes("`")) return `\`${trimmed}\``;
        // Double delimiter; pad when the content touches a backtick
        const padded = trimmed.startsWith("`") || trimmed.endsWith("`") ? ` ${trimmed} ` : trimmed;
        return `\`\`${padded}\`\``;
      },
    });
  }

  private detectCodeLanguage(pre: TurndownHTMLElement, code: Element | null): string {
    const fromAttribute =
      pre.getAttribute("lang") ||
      pre.getAttribute("language") ||
      code?.getAttribute("lang") ||
      code?.getAttribute("language");
    if (fromAttribute) return fromAttribute;

    const classes = `${pre.getAttribute("class") ?? ""} ${code?.getAttribute("class") ?? ""}`
      .split(/\s+/)
      .filter(Boolean);
    for (const cls of classes) {
      const prefix = CODE_BLOCK_LANG_PREFIXES.find((p) => cls.startsWith(p));
      if (prefix) return cls.substring(prefix.length);
    }
    return "";
  }

  // --- HTML Preparation ---

  // Drops <head> so <title> text does not leak into content, and gives header-less tables a header row.
  private prepareHtml(html: string): string {
    try {
      const root = parse(html, {
        comment: false,
        blockTextElements: { script: true, style: true, noscript: true, pre: true },
      });
      root.querySelector("head")?.remove();
      this.normalizeTablesForMarkdown(root);
      const body = root.querySelector("body");
      return (body ?? root).innerHTML;
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      console.warn(`MarkdownConverter: HTML preparation failed, converting input as-is: ${message}`);
      return html;
    }
  }

  /**
   * GFM tables need a header row: when a table has no <th>, its first row's cells are promoted.
   * Layout tables (role="presentation") are skipped.
   */
  private normalizeTablesForMarkdown(root: NHPHTMLElement): void {
    for (const table of root.querySelectorAll("table")) {
      if (table.getAttribute("role")?.toLowerCase() === "presentation") continue;
      if (table.querySelector("th")) continue;
      const firstRow = table.querySelector("tr");
      if (!firstRow) continue;
      for (const cell of firstRow.querySelectorAll("td")) {
        cell.tagName = "TH";
      }
    }
  }

  // --- Wrapping ---

  private wrapParagraphs(markdown: string, width: number): string {
    let inFence = false;
    const lines: string[] = [];

    for (const line of markdown.split("\n")) {
      if (FENCE_LINE.test(line)) {
        inFence = !inFence;
        lines.push(line);
        continue;
      }
      if (inFence || line.length <= width || UNWRAPPABLE_LINE.test(line)) {
        lines.push(line);
        continue;
      }
      lines.push(...this.wrapLine(line, width));
    }

    return lines.join("\n");
  }

  private wrapLine(line: string, width: number): string[] {
    const wrapped: string[] = [];
    let current = "";

    for (const word of line.split(" ").filter(Boolean)) {
      if (!current) {
        current = word;
      } else if (current.length + 1 + word.length <= width || BLOCK_MARKER_WORD.test(word)) {
        current += ` ${word}`;
      } else {
        wrapped.push(current);
        current = word;
      }
    }
    if (current) wrapped.push(current);

    return wrapped;
  }
}
