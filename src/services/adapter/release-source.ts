/**
 * Latest stable adapter version from the GitHub releases listing.
 *
 * The listing is scanned as text rather than parsed as JSON. The scan relies
 * on GitHub returning releases newest-first as a compact JSON array.
 */

import type { HttpClient, HttpResponse } from "../platform/network";
import { FailSafeLogger, type Logger } from "../logging";
import { getErrorMessage } from "../errors";

/**
 * Source of the newest published adapter version.
 */
export interface ReleaseSource {
  /**
   * Fetch the newest stable version (tag prefix removed).
   * Returns null on any transport, status or format problem; never throws.
   */
  fetchLatestStableVersion(): Promise<string | null>;
}

export interface GitHubReleaseSourceDeps {
  readonly httpClient: HttpClient;
  readonly logger: Logger;
  /** `owner/name` */
  readonly repository: string;
  readonly tagPrefix: string;
  readonly userAgent: string;
  readonly timeoutMs: number;
}

export function releasesUrl(repository: string): string {
  return `https://api.github.com/repos/${repository}/releases`;
}

export class GitHubReleaseSource implements ReleaseSource {
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly url: string;
  private readonly tagPrefix: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(deps: GitHubReleaseSourceDeps) {
    this.httpClient = deps.httpClient;
    this.logger = new FailSafeLogger(deps.logger);
    this.url = releasesUrl(deps.repository);
    this.tagPrefix = deps.tagPrefix;
    this.userAgent = deps.userAgent;
    this.timeoutMs = deps.timeoutMs;
  }

  async fetchLatestStableVersion(): Promise<string | null> {
    const url = this.url;

    let response: HttpResponse;
    try {
      response = await this.httpClient.fetch(url, {
        timeout: this.timeoutMs,
        headers: {
          "User-Agent": this.userAgent,
          Accept: "application/vnd.github+json",
        },
      });
    } catch (error) {
      this.logger.warn("Release listing request failed", { url, error: getErrorMessage(error) });
      return null;
    }

    if (!response.ok) {
      this.logger.warn("Release listing returned error status", { url, status: response.status });
      return null;
    }

    let body: string;
    try {
      body = new TextDecoder("utf-8", { fatal: true }).decode(response.body);
    } catch (error) {
      this.logger.warn("Release listing body unreadable", { url, error: getErrorMessage(error) });
      return null;
    }

    // HTML error pages and API error objects are not arrays
    if (!body.trimStart().startsWith("[")) {
      this.logger.warn("Release listing is not a JSON array", { url });
      return null;
    }

    const version = parseLatestStableVersion(body, this.tagPrefix);
    if (version === null) {
      this.logger.info("No stable release found", { url, tagPrefix: this.tagPrefix });
    } else {
      this.logger.debug("Latest stable release", { version });
    }
    return version;
  }
}

const TAG_KEY = '"tag_name":';
const RELEASE_SEPARATOR = "},{";
const PRERELEASE_MARKER = '"prerelease":true';
const DRAFT_MARKER = '"draft":true';

/**
 * Find the first stable release tag with the given prefix and return it
 * without the prefix.
 *
 * For each `"tag_name":` occurrence the value is the text between the next two
 * double quotes. A matching tag's release spans from the key to the next `},{`
 * (or the end of the body) and is skipped when that span contains
 * `"prerelease":true` or `"draft":true`. Fields before the tag, nested objects
 * and whitespace around separators are not understood.
 */
export function parseLatestStableVersion(body: string, tagPrefix: string): string | null {
  let offset = 0;

  while (true) {
    const tagStart = body.indexOf(TAG_KEY, offset);
    if (tagStart === -1) {
      return null;
    }

    const afterKey = tagStart + TAG_KEY.length;
    const valueStart = body.indexOf('"', afterKey);
    if (valueStart === -1) {
      return null;
    }
    const valueEnd = body.indexOf('"', valueStart + 1);
    if (valueEnd === -1) {
      return null;
    }
    const tagName = body.slice(valueStart + 1, valueEnd);

    if (tagName.startsWith(tagPrefix)) {
      const separator = body.indexOf(RELEASE_SEPARATOR, tagStart);
      const release = body.slice(tagStart, separator === -1 ? body.length : separator);

      if (!release.includes(PRERELEASE_MARKER) && !release.includes(DRAFT_MARKER)) {
        const version = stripPrefix(tagName, tagPrefix);
        if (version !== "") {
          return version;
        }
      }
    }

    offset = afterKey;
  }
}

/** Remove every leading repetition of `prefix`. */
function stripPrefix(value: string, prefix: string): string {
  if (prefix === "") {
    return value;
  }
  let rest = value;
  while (rest.startsWith(prefix)) {
    rest = rest.slice(prefix.length);
  }
  return rest;
}
