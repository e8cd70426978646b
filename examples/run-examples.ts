/**
 * 🚀 Sourcemark Examples
 *
 * 📄 simple-conversion.ts  - Web pages and raw HTML to Markdown
 * 🗂️ any-source.ts         - URLs and local files through one entry point
 */

console.log("👋 Welcome to Sourcemark!");
console.log("");
console.log("📚 Available examples:");
console.log("  npm run example:simple    # Web pages and raw HTML");
console.log("  npm run example:sources   # URLs and local files");
console.log("");
console.log("💡 Pick the example that fits your use case!");
