import type { FetchResult, Issue, IssueCategory, IssueType, PageRecord, Severity } from "./types";
import { extractPageSignals } from "./extractor";
import { isHtmlContentType } from "./fetcher";
import { extractDomain, normalizeUrl } from "./url-utils";
import { errorMessage } from "./errors";

export const TITLE_MIN_LENGTH = 10;
export const TITLE_MAX_LENGTH = 60;
export const META_DESCRIPTION_MIN_LENGTH = 50;
export const META_DESCRIPTION_MAX_LENGTH = 160;
export const ISSUE_PENALTY = 5;

export interface AnalyzeOptions {
  /** Host that counts as internal; defaults to the page's own domain. */
  baseHost?: string;
  depth?: number;
}

function createIssue(
  type: IssueType,
  severity: Severity,
  category: IssueCategory,
  description: string
): Issue {
  return { type, severity, category, description, affectedPages: 1 };
}

export function scorePage(issueCount: number): number {
  return Math.max(0, Math.min(100, 100 - ISSUE_PENALTY * issueCount));
}

function characterCount(text: string): number {
  return [...text].length;
}

export function detectPageIssues(title: string | null, metaDescription: string | null, h1: string[]): Issue[] {
  const issues: Issue[] = [];

  if (!title) {
    issues.push(createIssue("missing_title", "critical", "meta_tags", "The page has no title tag."));
  } else if (characterCount(title) < TITLE_MIN_LENGTH) {
    issues.push(
      createIssue("title_too_short", "warning", "meta_tags", `The title is shorter than ${TITLE_MIN_LENGTH} characters.`)
    );
  } else if (characterCount(title) > TITLE_MAX_LENGTH) {
    issues.push(
      createIssue("title_too_long", "warning", "meta_tags", `The title is longer than ${TITLE_MAX_LENGTH} characters.`)
    );
  }

  if (!metaDescription) {
    issues.push(
      createIssue("missing_meta_description", "warning", "meta_tags", "The page has no meta description.")
    );
  } else if (characterCount(metaDescription) < META_DESCRIPTION_MIN_LENGTH) {
    issues.push(
      createIssue(
        "meta_description_too_short",
        "notice",
        "meta_tags",
        `The meta description is shorter than ${META_DESCRIPTION_MIN_LENGTH} characters.`
      )
    );
  } else if (characterCount(metaDescription) > META_DESCRIPTION_MAX_LENGTH) {
    issues.push(
      createIssue(
        "meta_description_too_long",
        "notice",
        "meta_tags",
        `The meta description is longer than ${META_DESCRIPTION_MAX_LENGTH} characters.`
      )
    );
  }

  if (h1.length === 0) {
    issues.push(createIssue("missing_h1", "warning", "headings", "The page has no H1 heading."));
  } else if (h1.length > 1) {
    issues.push(createIssue("multiple_h1", "warning", "headings", `The page has ${h1.length} H1 headings.`));
  }

  return issues;
}

export function isIndexable(metaRobots: string | null, canonical: string | null, pageUrl: string): boolean {
  if (metaRobots && metaRobots.toLowerCase().includes("noindex")) {
    return false;
  }

  if (canonical) {
    const normalizedCanonical = normalizeUrl(canonical, pageUrl);
    if (normalizedCanonical.ok && normalizedCanonical.url !== pageUrl) {
      return false;
    }
  }

  return true;
}

function emptyRecord(url: string, finalUrl: string, depth: number): PageRecord {
  return {
    url,
    finalUrl,
    statusCode: 0,
    title: null,
    metaDescription: null,
    h1: [],
    canonicalUrl: null,
    metaRobots: null,
    contentType: null,
    sizeBytes: 0,
    wordCount: 0,
    indexable: false,
    score: 0,
    internalLinks: [],
    externalLinks: [],
    issues: [],
    depth,
  };
}

function failureIssue(url: string, result: FetchResult): Issue {
  if (result.kind === "timeout") {
    return createIssue("timeout", "critical", "crawlability", `Timed out while fetching ${url}.`);
  }
  if (result.kind === "network_error") {
    return createIssue("fetch_error", "critical", "crawlability", `Failed to fetch the page: ${result.detail}`);
  }
  return createIssue(
    `http_error:${result.status}`,
    "critical",
    "crawlability",
    `The page returned HTTP status ${result.status}.`
  );
}

function declaredSize(headers: Record<string, string>): number {
  const length = parseInt(headers["content-length"] ?? "", 10);
  return Number.isFinite(length) && length > 0 ? length : 0;
}

function normalizeOrSelf(url: string): string {
  const normalized = normalizeUrl(url);
  return normalized.ok ? normalized.url : url;
}

/**
 * Turns one fetch into the page record for `url`. Never throws: failures
 * become non-indexable records carrying a single issue.
 */
export function analyze(url: string, result: FetchResult, options: AnalyzeOptions = {}): PageRecord {
  const pageUrl = normalizeOrSelf(url);
  const depth = options.depth ?? 0;

  if (result.kind !== "success" || result.status < 200 || result.status >= 300) {
    const record = emptyRecord(pageUrl, pageUrl, depth);
    if (result.kind === "success") {
      record.statusCode = result.status;
      record.finalUrl = normalizeOrSelf(result.finalUrl);
      record.contentType = result.headers["content-type"] ?? null;
    }
    record.issues = [failureIssue(pageUrl, result)];
    record.score = scorePage(record.issues.length);
    return record;
  }

  const finalUrl = normalizeOrSelf(result.finalUrl);
  const contentType = result.headers["content-type"] ?? null;
  const record = emptyRecord(pageUrl, finalUrl, depth);
  record.statusCode = result.status;
  record.contentType = contentType;

  if (!isHtmlContentType(contentType)) {
    record.sizeBytes = declaredSize(result.headers);
    record.issues = [
      createIssue("not_html", "notice", "crawlability", `Not an HTML page: ${contentType ?? "unknown content type"}.`),
    ];
    record.score = scorePage(record.issues.length);
    return record;
  }

  record.sizeBytes = Buffer.byteLength(result.body, "utf8");

  try {
    const signals = extractPageSignals(result.body, finalUrl, options.baseHost ?? extractDomain(finalUrl));
    const issues = detectPageIssues(signals.title, signals.metaDescription, signals.h1);

    return {
      ...record,
      title: signals.title,
      metaDescription: signals.metaDescription,
      h1: signals.h1,
      canonicalUrl: signals.canonical,
      metaRobots: signals.metaRobots,
      wordCount: signals.wordCount,
      indexable: isIndexable(signals.metaRobots, signals.canonical, finalUrl),
      score: scorePage(issues.length),
      internalLinks: signals.internalLinks,
      externalLinks: signals.externalLinks,
      issues,
    };
  } catch (error) {
    record.issues = [
      createIssue("parse_error", "notice", "crawlability", `The HTML could not be parsed: ${errorMessage(error)}`),
    ];
    record.score = scorePage(record.issues.length);
    return record;
  }
}
