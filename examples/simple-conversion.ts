import { HtmlConverter } from "../src/index.js";

/**
 * Web page to Markdown with HtmlConverter
 *
 * Navigation, sidebars, ads and scripts are stripped before conversion.
 */

async function main() {
  const converter = new HtmlConverter({ maxBlankLines: 1 });

  console.log("📰 Converting article to markdown...");
  const article = await converter.convert("https://example.com/article");

  console.log(`Title: ${article.title ?? "(untitled)"}`);
  console.log(`Content:\n${article.content}`);

  // Raw HTML works too, no request needed
  const snippet = converter.convertHtml(`<nav>Menu</nav><h3>Notes</h3><p>Kept   as text.</p>`);
  console.log(`\nSnippet:\n${snippet}`);
}

main().catch(console.error);
