import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SourceConverter } from "../src/SourceConverter.js";
import { ConverterRegistry } from "../src/ConverterRegistry.js";
import type { IConverter } from "../src/IConverter.js";
import type { ConversionResult } from "../src/types.js";

const mockFetch = vi.fn();

function fakeDocsConverter() {
  const convert = vi.fn(
    async (input: string): Promise<ConversionResult> => ({
      content: "# Shared doc",
      title: "Shared doc",
      url: input,
      sourceType: "googleDocs",
      statusCode: 200,
    })
  );
  const converter: IConverter = { name: "Fake Docs", convert };
  return { converter, convert };
}

describe("ConverterRegistry", () => {
  it("registers, replaces and lists converters", () => {
    const registry = new ConverterRegistry();
    const first = fakeDocsConverter();
    const second = fakeDocsConverter();

    registry.register("googleDocs", first.converter).register("googleDocs", second.converter);

    expect(registry.get("googleDocs")).toBe(second.converter);
    expect(registry.get("html")).toBeUndefined();
    expect(registry.supportedTypes()).toEqual(["googleDocs"]);
  });
});

describe("SourceConverter", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      headers: new Headers({ "Content-Type": "text/html" }),
      text: async () => "<html><body><h1>Post</h1><p>Text</p></body></html>",
      url: "https://example.com/post?id=1",
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("handles HTML and local files out of the box", () => {
    expect(new SourceConverter().supportedTypes()).toEqual(["html", "localFile"]);
  });

  it("fetches HTML pages at their normalized URL", async () => {
    const converter = new SourceConverter({ headers: { "X-Token": "test-secret" } });
    const result = await converter.convert("https://example.com/post?utm_source=feed&id=1");

    expect(mockFetch).toHaveBeenCalledWith(
      "https://example.com/post?id=1",
      expect.objectContaining({ headers: expect.objectContaining({ "X-Token": "test-secret" }) })
    );
    expect(result.content).toBe("# Post\n\nText");
    expect(result.sourceType).toBe("html");
  });

  it("passes config through to the HTML converter", async () => {
    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      headers: new Headers({ "Content-Type": "text/html" }),
      text: async () => "<html><body><aside>Side</aside><p>Main</p></body></html>",
      url: "https://example.com/page",
    });
    const result = await new SourceConverter({ config: { removeSidebars: false } }).convert(
      "https://example.com/page"
    );
    expect(result.content).toBe("Side\n\nMain");
  });

  it("reads local files without touching the network", async () => {
    const dir = await mkdtemp(join(tmpdir(), "sourcemark-source-"));
    try {
      const filePath = join(dir, "doc.md");
      await writeFile(filePath, "# Local\n\nBody");
      const result = await new SourceConverter().convert(filePath);
      expect(result).toMatchObject({ content: "# Local\n\nBody", title: "Local", sourceType: "localFile" });
      expect(mockFetch).not.toHaveBeenCalled();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("reports source types without a converter", async () => {
    await expect(
      new SourceConverter().convert("https://docs.google.com/document/d/abc123/edit")
    ).rejects.toMatchObject({ code: "ERR_UNSUPPORTED_SOURCE" });
  });

  it("dispatches to registered converters with the normalized URL", async () => {
    const docs = fakeDocsConverter();
    const converter = new SourceConverter().register("googleDocs", docs.converter);

    const result = await converter.convert("https://docs.google.com/document/d/abc123/edit?utm_campaign=x");

    expect(docs.convert).toHaveBeenCalledWith("https://docs.google.com/document/d/abc123/edit");
    expect(result.sourceType).toBe("googleDocs");
    expect(converter.supportedTypes()).toEqual(["html", "localFile", "googleDocs"]);
  });

  it("rejects input that is neither a URL nor a path", async () => {
    await expect(new SourceConverter().convert("example.com")).rejects.toMatchObject({ code: "ERR_INVALID_URL" });
  });
});
