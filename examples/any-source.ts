import { ConversionError, SourceConverter } from "../src/index.js";

/**
 * One entry point for URLs and local files
 *
 * Tracking parameters are dropped from URLs before fetching.
 */

async function main() {
  const converter = new SourceConverter({ config: { removeAds: false } });
  console.log(`Supported sources: ${converter.supportedTypes().join(", ")}`);

  for (const input of ["./README.md", "https://example.com/post?utm_source=newsletter", "example.com"]) {
    try {
      const result = await converter.convert(input);
      console.log(`✅ ${input} (${result.sourceType}) → ${result.content.length} chars`);
    } catch (error) {
      if (error instanceof ConversionError) {
        console.error(`❌ ${input}: [${error.code}] ${error.message}`);
      } else {
        throw error;
      }
    }
  }
}

main().catch(console.error);
