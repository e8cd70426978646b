export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

export const HTML_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml",
  "Accept-Language": "en-US,en;q=0.9",
};

export const HTML_CONTENT_TYPES: ReadonlyArray<string> = ["text/html", "application/xhtml+xml"];

export const EMPTY_HTML_DOCUMENT_MARKER = "<!-- Empty HTML document -->";

// Element stripper - class fragments per removal category
export const NAVIGATION_CLASSES: ReadonlyArray<string> = ["nav", "navigation"];
export const SIDEBAR_CLASSES: ReadonlyArray<string> = ["sidebar", "side-bar"];
export const AD_CLASSES: ReadonlyArray<string> = ["ad", "ads", "advertisement"];

// URL detection
export const TRACKING_PARAMS: ReadonlySet<string> = new Set([
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
  "ref",
  "source",
  "campaign",
  "medium",
  "term",
  "gclid",
  "fbclid",
  "msclkid",
  "_ga",
  "_gid",
  "mc_cid",
  "mc_eid",
]);

// Regex
export const REGEX_ATX_HEADING_TEXT = /^\s{0,3}#{1,6}\s+(.+?)(?:\s+#+)?\s*$/m;
