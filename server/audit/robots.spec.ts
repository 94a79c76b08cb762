import { describe, it, expect } from "vitest";
import { EMPTY_ROBOTS_RULES, isPathAllowed, parseRobotsTxt } from "./robots";

const ROBOTS = `
# comment line
User-agent: *
Disallow: /private
Allow: /private/public
Crawl-delay: 2

User-agent: otherbot
User-agent: thirdbot
Disallow: /
`;

describe("parseRobotsTxt", () => {
  it("uses the wildcard group when no group names the agent", () => {
    expect(parseRobotsTxt(ROBOTS, "site-audit-crawler/1.0")).toEqual({
      disallow: ["/private"],
      allow: ["/private/public"],
      crawlDelaySeconds: 2,
    });
  });

  it("prefers a group naming the agent, including grouped agent lines", () => {
    expect(parseRobotsTxt(ROBOTS, "ThirdBot/2.0 (+https://example.com)")).toEqual({
      disallow: ["/"],
      allow: [],
      crawlDelaySeconds: null,
    });
  });

  it("returns empty rules for empty content", () => {
    expect(parseRobotsTxt("", "site-audit-crawler")).toEqual(EMPTY_ROBOTS_RULES);
  });

  it("ignores blank user-agent values", () => {
    const rules = parseRobotsTxt("User-agent:\nDisallow: /x\n", "site-audit-crawler");
    expect(rules.disallow).toEqual([]);
  });
});

describe("isPathAllowed", () => {
  const rules = parseRobotsTxt(ROBOTS, "site-audit-crawler");

  it("blocks disallowed prefixes", () => {
    expect(isPathAllowed(rules, "https://example.com/private")).toBe(false);
    expect(isPathAllowed(rules, "https://example.com/private/notes")).toBe(false);
  });

  it("lets the longer allow rule win", () => {
    expect(isPathAllowed(rules, "https://example.com/private/public/page")).toBe(true);
  });

  it("allows everything else", () => {
    expect(isPathAllowed(rules, "https://example.com/")).toBe(true);
    expect(isPathAllowed(rules, "https://example.com/about")).toBe(true);
  });

  it("supports wildcards and end anchors", () => {
    const pdfRules = { disallow: ["/*.pdf$"], allow: [], crawlDelaySeconds: null };
    expect(isPathAllowed(pdfRules, "https://example.com/files/report.pdf")).toBe(false);
    expect(isPathAllowed(pdfRules, "https://example.com/files/report.pdf.html")).toBe(true);
  });

  it("prefers allow on an equal-length tie", () => {
    const tie = { disallow: ["/docs"], allow: ["/docs"], crawlDelaySeconds: null };
    expect(isPathAllowed(tie, "https://example.com/docs/intro")).toBe(true);
  });
});
