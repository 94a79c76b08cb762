export interface RobotsRules {
  disallow: string[];
  allow: string[];
  crawlDelaySeconds: number | null;
}

export const EMPTY_ROBOTS_RULES: RobotsRules = { disallow: [], allow: [], crawlDelaySeconds: null };

function agentToken(userAgent: string): string {
  return userAgent.split(/[\s/]/)[0].toLowerCase();
}

/**
 * Reads the groups that apply to `userAgent`: a group naming the agent wins
 * over the `*` group. Prefix rules only, with `*` and `$` wildcards.
 */
export function parseRobotsTxt(content: string, userAgent: string): RobotsRules {
  const token = agentToken(userAgent);
  const specific: RobotsRules = { disallow: [], allow: [], crawlDelaySeconds: null };
  const wildcard: RobotsRules = { disallow: [], allow: [], crawlDelaySeconds: null };

  let groupAgents: string[] = [];
  let inAgentLines = false;
  let sawSpecificGroup = false;

  for (const rawLine of content.split("\n")) {
    const line = rawLine.replace(/#.*$/, "").trim();
    const colonIndex = line.indexOf(":");
    if (colonIndex === -1) continue;

    const directive = line.substring(0, colonIndex).toLowerCase().trim();
    const value = line.substring(colonIndex + 1).trim();

    if (directive === "user-agent") {
      if (!inAgentLines) groupAgents = [];
      groupAgents.push(value.toLowerCase());
      inAgentLines = true;
      continue;
    }
    inAgentLines = false;

    const targets: RobotsRules[] = [];
    if (token && groupAgents.some((agent) => agent !== "" && agent !== "*" && token.includes(agent))) {
      targets.push(specific);
      sawSpecificGroup = true;
    }
    if (groupAgents.includes("*")) targets.push(wildcard);

    for (const target of targets) {
      if (directive === "disallow" && value) {
        target.disallow.push(value);
      } else if (directive === "allow" && value) {
        target.allow.push(value);
      } else if (directive === "crawl-delay") {
        const delay = parseFloat(value);
        if (!isNaN(delay) && delay >= 0) target.crawlDelaySeconds = delay;
      }
    }
  }

  return sawSpecificGroup ? specific : wildcard;
}

function ruleToRegex(rule: string): RegExp {
  const anchored = rule.endsWith("$");
  const body = (anchored ? rule.slice(0, -1) : rule)
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*");
  return new RegExp(`^${body}${anchored ? "$" : ""}`);
}

function longestMatch(rules: string[], path: string): number {
  let longest = -1;
  for (const rule of rules) {
    if (ruleToRegex(rule).test(path) && rule.length > longest) {
      longest = rule.length;
    }
  }
  return longest;
}

/** The longest matching rule decides; Allow wins a tie. */
export function isPathAllowed(rules: RobotsRules, urlString: string): boolean {
  let path: string;
  try {
    path = new URL(urlString).pathname;
  } catch {
    return true;
  }

  const disallowed = longestMatch(rules.disallow, path);
  if (disallowed === -1) return true;
  return longestMatch(rules.allow, path) >= disallowed;
}
