import { readFile } from "fs/promises";
import { z } from "zod";
import type { PageRecord } from "./audit/types";

const HTTP_ERROR_TYPE = /^http_error:\d+$/;

const IssueTypeSchema = z.union([
  z.enum([
    "fetch_error",
    "timeout",
    "not_html",
    "parse_error",
    "missing_title",
    "title_too_short",
    "title_too_long",
    "missing_meta_description",
    "meta_description_too_short",
    "meta_description_too_long",
    "missing_h1",
    "multiple_h1",
  ]),
  z.custom<`http_error:${number}`>((value) => typeof value === "string" && HTTP_ERROR_TYPE.test(value)),
]);

const LinkSchema = z.object({
  url: z.string(),
  text: z.string(),
  nofollow: z.boolean(),
});

const IssueSchema = z.object({
  type: IssueTypeSchema,
  severity: z.enum(["critical", "warning", "opportunity", "notice"]),
  category: z.enum(["crawlability", "meta_tags", "headings"]),
  description: z.string(),
  affectedPages: z.number(),
});

const PageRecordSchema = z.object({
  url: z.string(),
  finalUrl: z.string(),
  statusCode: z.number().int(),
  title: z.string().nullable(),
  metaDescription: z.string().nullable(),
  h1: z.array(z.string()),
  canonicalUrl: z.string().nullable(),
  metaRobots: z.string().nullable(),
  contentType: z.string().nullable(),
  sizeBytes: z.number(),
  wordCount: z.number(),
  indexable: z.boolean(),
  score: z.number(),
  internalLinks: z.array(LinkSchema),
  externalLinks: z.array(LinkSchema),
  issues: z.array(IssueSchema),
  depth: z.number().int().nonnegative(),
});

/** Accepts a saved crawl outcome (`{ pages: [...] }`) or a bare page array. */
const BaselineFileSchema = z.union([
  z.object({ pages: z.array(PageRecordSchema) }).transform((file) => file.pages),
  z.array(PageRecordSchema),
]);

export function parseBaseline(content: string): PageRecord[] {
  const pages: PageRecord[] = BaselineFileSchema.parse(JSON.parse(content));
  return pages;
}

export async function loadBaseline(path: string): Promise<PageRecord[]> {
  return parseBaseline(await readFile(path, "utf8"));
}
