import { describe, it, expect, vi } from "vitest";
import { MarkdownConverter } from "../src/utils/markdown-converter.js";

describe("MarkdownConverter", () => {
  it("converts tables without explicit header rows to GFM with promoted headers", () => {
    const html = "<table><tr><td>Name</td><td>Role</td></tr><tr><td>Ada</td><td>Engineer</td></tr></table>";
    const converter = new MarkdownConverter();
    const markdown = converter.convert(html);
    expect(markdown).not.toContain("<table");
    expect(markdown).toContain("| Name | Role |");
    expect(markdown).toContain("| Ada | Engineer |");
  });

  it("drops the document head", () => {
    const html = "<html><head><title>Hidden Title</title></head><body><p>Body text</p></body></html>";
    expect(new MarkdownConverter().convert(html)).toBe("Body text");
  });

  it("writes fenced code blocks with the language from the class", () => {
    const html = `<pre><code class="language-ts">const x = 1;\n</code></pre>`;
    expect(new MarkdownConverter().convert(html)).toBe("```ts\nconst x = 1;\n```");
  });

  it("keeps link titles and leaves empty link text empty", () => {
    const converter = new MarkdownConverter();
    expect(converter.convert(`<p><a href="https://example.com" title="Example">site</a></p>`)).toBe(
      `[site](https://example.com "Example")`
    );
    expect(converter.convert(`<p>Go <a href="#x"></a> now</p>`)).toContain("[](#x)");
  });

  it("drops form controls", () => {
    const html = `<p>Keep</p><form><input name="q"><button>Go</button></form>`;
    expect(new MarkdownConverter().convert(html)).toBe("Keep");
  });

  it("wraps long paragraphs at the configured width", () => {
    const converter = new MarkdownConverter({ maxLineWidth: 20 });
    expect(converter.convert("<p>alpha beta gamma delta epsilon zeta</p>")).toBe(
      "alpha beta gamma\ndelta epsilon zeta"
    );
  });

  it("never wraps headings", () => {
    const converter = new MarkdownConverter({ maxLineWidth: 20 });
    expect(converter.convert("<h1>alpha beta gamma delta epsilon zeta</h1>")).toBe(
      "# alpha beta gamma delta epsilon zeta"
    );
  });

  it("does not wrap when the width is 0", () => {
    const converter = new MarkdownConverter({ maxLineWidth: 0 });
    expect(converter.convert("<p>alpha beta gamma delta epsilon zeta</p>")).toBe(
      "alpha beta gamma delta epsilon zeta"
    );
  });

  it("does not warn on well-formed input", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    new MarkdownConverter().convert("<div><p>Content</p></div>");
    expect(warnSpy).not.toHaveBeenCalled();
    warnSpy.mockRestore();
  });
});
