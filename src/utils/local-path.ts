// Scheme prefixes that mark an input as a URL even without "://".
const KNOWN_URL_SCHEMES: ReadonlyArray<string> = [
  "data:",
  "javascript:",
  "mailto:",
  "ftp:",
  "tel:",
  "sms:",
  "http:",
  "https:",
];

const COMMON_TLDS: ReadonlySet<string> = new Set(["com", "org", "net", "edu", "gov", "mil", "int", "io", "co"]);

const FILE_EXTENSIONS: ReadonlySet<string> = new Set([
  "md",
  "txt",
  "json",
  "xml",
  "yaml",
  "yml",
  "toml",
  "ini",
  "cfg",
  "conf",
  "py",
  "rs",
  "js",
  "ts",
  "html",
  "css",
  "java",
  "cpp",
  "c",
  "h",
  "pdf",
  "doc",
  "docx",
  "png",
  "jpg",
  "jpeg",
  "gif",
  "svg",
]);

// Well-known files that usually ship without an extension.
const EXTENSIONLESS_FILES: ReadonlySet<string> = new Set([
  "Makefile",
  "README",
  "LICENSE",
  "CHANGELOG",
  "CONTRIBUTING",
  "Dockerfile",
  "Vagrantfile",
  "Cargo",
  "package",
]);

const WINDOWS_DRIVE_PATH = /^[A-Za-z]:[\\/]/;

function hasKnownScheme(input: string): boolean {
  return KNOWN_URL_SCHEMES.some((scheme) => input.startsWith(scheme));
}

function looksLikeBareFilename(input: string): boolean {
  if (input.includes(".") && !input.includes(" ")) {
    const parts = input.split(".");
    const last = parts[parts.length - 1];

    // "example.com" and friends are domains, not files
    if (parts.length === 2 && COMMON_TLDS.has(parts[1])) {
      return false;
    }
    if (FILE_EXTENSIONS.has(last)) {
      return true;
    }

    const dotCount = parts.length - 1;
    if (!input.includes("..") && dotCount <= 2 && !COMMON_TLDS.has(last)) {
      return true;
    }
  }

  if (!input.includes(".") && !input.includes(" ") && input.length > 0) {
    return EXTENSIONLESS_FILES.has(input);
  }

  return false;
}

/**
 * Decides whether an input string names a local file (path or `file://` URL) rather than a remote URL.
 *
 * Recognized forms: `file://…`, absolute Unix paths, `./` and `../` relative paths, Windows drive paths,
 * scheme-less paths with a separator, and bare filenames with a known extension (`notes.md`) or a
 * well-known extensionless name (`Makefile`). Bare domains such as `example.com` are rejected.
 *
 * @example
 * isLocalFilePath("docs/README.md"); // true
 * isLocalFilePath("archive.com.txt"); // true
 * isLocalFilePath("example.com"); // false
 * isLocalFilePath("//cdn.example.com/app.js"); // false
 */
export function isLocalFilePath(input: string): boolean {
  const trimmed = input.trim();

  if (trimmed.startsWith("file://")) {
    return true;
  }

  // Absolute Unix path, but not a protocol-relative URL
  if (trimmed.startsWith("/") && !trimmed.startsWith("//")) {
    return true;
  }

  if (trimmed.startsWith("./") || trimmed.startsWith("../")) {
    return true;
  }

  if (WINDOWS_DRIVE_PATH.test(trimmed)) {
    return true;
  }

  if (!trimmed.includes("://") && (trimmed.includes("/") || trimmed.includes("\\"))) {
    if (trimmed.startsWith("//") || hasKnownScheme(trimmed)) {
      return false;
    }
    return (
      !trimmed.startsWith("www.") &&
      (trimmed.startsWith(".") || trimmed.includes("/") || trimmed.includes("\\"))
    );
  }

  if (!trimmed.includes("://") && !trimmed.includes("www.") && !trimmed.startsWith("//")) {
    if (hasKnownScheme(trimmed)) {
      return false;
    }
    return looksLikeBareFilename(trimmed);
  }

  return false;
}
