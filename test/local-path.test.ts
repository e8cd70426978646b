import { describe, it, expect } from "vitest";
import { isLocalFilePath } from "../src/utils/local-path.js";

describe("isLocalFilePath", () => {
  it.each([
    "file:///tmp/notes.md",
    "/usr/local/share/doc.md",
    "./notes.md",
    "../up/notes.md",
    "C:\\docs\\file.md",
    "C:/docs/file.md",
    "docs/guide.md",
    "docs\\guide.md",
    "notes.md",
    "archive.com.txt",
    "my.config.bak",
    "README",
    "Makefile",
    "  ./padded.md  ",
  ])("treats %j as a local path", (input) => {
    expect(isLocalFilePath(input)).toBe(true);
  });

  it.each([
    "example.com",
    "sub.example.io",
    "https://example.com",
    "http://example.com/file.md",
    "ftp://example.com/file.txt",
    "mailto:someone@example.com",
    "data:text/plain,hello",
    "javascript:alert(1)",
    "tel:5551234",
    "//cdn.example.com/app.js",
    "www.example.com/page",
    "www.example.com",
    "random",
    "two words.md",
    "a..b",
    "",
    "   ",
  ])("treats %j as not local", (input) => {
    expect(isLocalFilePath(input)).toBe(false);
  });
});
