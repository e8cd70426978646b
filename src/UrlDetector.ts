import type { SourceType } from "./types.js";
import { TRACKING_PARAMS } from "./constants.js";
import { ConversionError } from "./errors.js";
import { isLocalFilePath } from "./utils/local-path.js";

/**
 * Routes a URL to a source type by host and path.
 * `domainPattern` may start with `*.` to match the bare domain and every subdomain;
 * `pathPattern` is a prefix, or contains one `*` as a trailing, leading or inner wildcard (`/docs/*`, `*.pdf`).
 */
export interface UrlPattern {
  domainPattern: string;
  pathPattern?: string;
  sourceType: SourceType;
}

export const DEFAULT_URL_PATTERNS: ReadonlyArray<UrlPattern> = [
  { domainPattern: "docs.google.com", pathPattern: "/document/", sourceType: "googleDocs" },
  { domainPattern: "drive.google.com", pathPattern: "/file/", sourceType: "googleDocs" },
];

const ISSUE_NUMBER = /^\d+$/;

function matchesDomain(host: string, pattern: string): boolean {
  if (pattern.startsWith("*.")) {
    const baseDomain = pattern.slice(2);
    return host === baseDomain || host.endsWith(`.${baseDomain}`);
  }
  return host === pattern;
}

function matchesPath(path: string, pattern: string): boolean {
  if (!pattern.includes("*")) {
    return path.startsWith(pattern);
  }
  if (pattern.endsWith("*")) {
    return path.startsWith(pattern.slice(0, -1));
  }
  if (pattern.startsWith("*")) {
    return path.endsWith(pattern.slice(1));
  }
  const parts = pattern.split("*");
  return parts.length === 2 && path.startsWith(parts[0]) && path.endsWith(parts[1]);
}

function matchesPattern(url: URL, pattern: UrlPattern): boolean {
  if (!matchesDomain(url.hostname, pattern.domainPattern)) {
    return false;
  }
  return pattern.pathPattern === undefined || matchesPath(url.pathname, pattern.pathPattern);
}

/**
 * UrlDetector - Classifies inputs for the converter registry and cleans remote URLs.
 */
export class UrlDetector {
  constructor(
    private readonly patterns: ReadonlyArray<UrlPattern> = DEFAULT_URL_PATTERNS,
    private readonly trackingParams: ReadonlySet<string> = TRACKING_PARAMS
  ) {}

  /**
   * @throws {ConversionError} ERR_INVALID_URL when the input is neither a local path nor an http(s) URL.
   */
  public detectType(input: string): SourceType {
    if (isLocalFilePath(input)) {
      return "localFile";
    }

    const url = this.parseUrl(input);

    if (this.isGitHubIssueUrl(url)) {
      return "githubIssue";
    }

    const match = this.patterns.find((pattern) => matchesPattern(url, pattern));
    return match ? match.sourceType : "html";
  }

  /**
   * Trims the URL and drops tracking query parameters, keeping the others in order.
   *
   * @throws {ConversionError} ERR_INVALID_URL for non-http(s) or unparseable input.
   */
  public normalizeUrl(input: string): string {
    const url = this.parseUrl(input);

    // Raw pairs are kept as written so encoded values survive
    const kept = url.search
      .slice(1)
      .split("&")
      .filter((pair) => {
        const [key] = [...new URLSearchParams(pair).keys()];
        return key !== undefined && !this.trackingParams.has(key);
      });
    url.search = kept.join("&");

    return url.toString();
  }

  /**
   * @throws {ConversionError} ERR_INVALID_URL for non-http(s) or unparseable input.
   */
  public validateUrl(input: string): void {
    this.parseUrl(input);
  }

  private parseUrl(input: string): URL {
    const trimmed = input.trim();
    if (!trimmed.startsWith("http://") && !trimmed.startsWith("https://")) {
      throw new ConversionError(`Invalid URL, expected http(s): ${input}`, "ERR_INVALID_URL");
    }
    try {
      return new URL(trimmed);
    } catch (error: unknown) {
      throw new ConversionError(
        `Invalid URL: ${input}`,
        "ERR_INVALID_URL",
        error instanceof Error ? error : undefined
      );
    }
  }

  // github.com/{owner}/{repo}/(issues|pull)/{n} and api.github.com/repos/{owner}/{repo}/(issues|pulls)/{n}
  private isGitHubIssueUrl(url: URL): boolean {
    const segments = url.pathname.split("/").filter(Boolean);

    if (url.hostname === "github.com") {
      return segments.length >= 4 && ["issues", "pull"].includes(segments[2]) && ISSUE_NUMBER.test(segments[3]);
    }
    if (url.hostname === "api.github.com") {
      return (
        segments.length >= 5 &&
        segments[0] === "repos" &&
        ["issues", "pulls"].includes(segments[3]) &&
        ISSUE_NUMBER.test(segments[4])
      );
    }
    return false;
  }
}
