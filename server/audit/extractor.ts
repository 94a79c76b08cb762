import * as cheerio from "cheerio";
import type { LinkRecord } from "./types";
import { isInternal, normalizeUrl } from "./url-utils";

const NON_VISIBLE_SELECTORS = ["script", "style", "noscript", "template"];

const TEXT_NODE = 3;

export interface PageSignals {
  title: string | null;
  metaDescription: string | null;
  h1: string[];
  canonical: string | null;
  metaRobots: string | null;
  wordCount: number;
  internalLinks: LinkRecord[];
  externalLinks: LinkRecord[];
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function metaContent($: cheerio.CheerioAPI, name: string): string | null {
  const meta = $("meta")
    .filter((_, el) => ($(el).attr("name") || "").trim().toLowerCase() === name)
    .first();
  const content = meta.attr("content")?.trim();
  return content ? content : null;
}

function extractCanonical($: cheerio.CheerioAPI): string | null {
  const link = $("link[rel]")
    .filter((_, el) => ($(el).attr("rel") || "").toLowerCase().split(/\s+/).includes("canonical"))
    .first();
  const href = link.attr("href")?.trim();
  return href ? href : null;
}

function countWords($: cheerio.CheerioAPI): number {
  const $body = $("body");
  const $root: cheerio.Cheerio<(typeof $body)[number] | ReturnType<typeof $.root>[number]> = $body.length
    ? $body
    : $.root();
  $root.find(NON_VISIBLE_SELECTORS.join(", ")).remove();

  // Text node by text node, so adjacent elements do not glue words together
  const chunks: string[] = [];
  $root
    .find("*")
    .addBack()
    .contents()
    .each((_, node) => {
      if (node.nodeType === TEXT_NODE) chunks.push($(node).text());
    });

  return chunks.join(" ").split(/\s+/).filter(Boolean).length;
}

function extractLinks(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  baseHost: string
): { internalLinks: LinkRecord[]; externalLinks: LinkRecord[] } {
  const internalLinks: LinkRecord[] = [];
  const externalLinks: LinkRecord[] = [];

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") || "").trim();
    if (!href || href.startsWith("#")) return;

    const normalized = normalizeUrl(href, pageUrl);
    if (!normalized.ok) return;

    const rel = ($(el).attr("rel") || "").toLowerCase().split(/\s+/);
    const link: LinkRecord = {
      url: normalized.url,
      text: collapse($(el).text()),
      nofollow: rel.includes("nofollow"),
    };

    if (isInternal(normalized.url, baseHost)) {
      internalLinks.push(link);
    } else {
      externalLinks.push(link);
    }
  });

  return { internalLinks, externalLinks };
}

export function extractPageSignals(html: string, pageUrl: string, baseHost: string): PageSignals {
  const $ = cheerio.load(html);

  const title = collapse($("title").first().text()) || null;
  const h1 = $("h1")
    .map((_, el) => collapse($(el).text()))
    .get();

  // Links and head signals first: word counting strips nodes from the tree
  const { internalLinks, externalLinks } = extractLinks($, pageUrl, baseHost);
  const metaDescription = metaContent($, "description");
  const metaRobots = metaContent($, "robots");
  const canonical = extractCanonical($);
  const wordCount = countWords($);

  return {
    title,
    metaDescription,
    h1,
    canonical,
    metaRobots,
    wordCount,
    internalLinks,
    externalLinks,
  };
}
