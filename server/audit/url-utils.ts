import * as dns from "dns";
import * as net from "net";

const PRIVATE_IP_RANGES = [
  /^127\./,
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^169\.254\./,
  /^0\./,
  /^::1$/,
  /^fe80:/i,
  /^fc00:/i,
  /^fd00:/i,
];

const BLOCKED_HOSTS = ["localhost", "127.0.0.1", "0.0.0.0", "::1", "[::1]"];

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;

export type NormalizeResult =
  | { ok: true; url: string }
  | { ok: false; error: string };

export function isPrivateIP(ip: string): boolean {
  return PRIVATE_IP_RANGES.some((regex) => regex.test(ip));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase();
  return BLOCKED_HOSTS.includes(lower) || lower.endsWith(".local");
}

export async function resolveHostToIP(hostname: string): Promise<string[]> {
  return new Promise((resolve) => {
    dns.lookup(hostname, { all: true }, (err, addresses) => {
      if (err) {
        resolve([]);
      } else {
        resolve(addresses.map((a) => a.address));
      }
    });
  });
}

export async function isSSRFSafe(urlString: string): Promise<{ safe: boolean; reason?: string }> {
  let parsed: URL;
  try {
    parsed = new URL(urlString);
  } catch (e) {
    return { safe: false, reason: `Invalid URL: ${e}` };
  }

  if (!["http:", "https:"].includes(parsed.protocol)) {
    return { safe: false, reason: `Blocked protocol: ${parsed.protocol}` };
  }

  if (isBlockedHost(parsed.hostname)) {
    return { safe: false, reason: `Blocked host: ${parsed.hostname}` };
  }

  if (net.isIP(parsed.hostname)) {
    if (isPrivateIP(parsed.hostname)) {
      return { safe: false, reason: `Private IP blocked: ${parsed.hostname}` };
    }
  } else {
    const ips = await resolveHostToIP(parsed.hostname);
    for (const ip of ips) {
      if (isPrivateIP(ip)) {
        return { safe: false, reason: `Hostname resolves to private IP: ${ip}` };
      }
    }
  }

  return { safe: true };
}

function stripWww(hostname: string): string {
  const lower = hostname.toLowerCase();
  return lower.startsWith("www.") ? lower.slice(4) : lower;
}

function withScheme(raw: string): string {
  if (raw.startsWith("//")) return `https:${raw}`;

  const scheme = raw.match(SCHEME_PATTERN);
  if (!scheme) return `https://${raw}`;

  // "example.com:8080/path" looks like a scheme but is a host with a port
  const rest = raw.slice(scheme[0].length);
  if (!rest.startsWith("//") && /^\d+(\/|$)/.test(rest)) return `https://${raw}`;

  return raw;
}

/**
 * Canonical form used as the identity of a page within a run:
 * http(s) only, lower-cased host without `www.`, no default port,
 * no credentials, query or fragment, no trailing slash except the root.
 */
export function normalizeUrl(urlString: string, baseUrl?: string): NormalizeResult {
  const raw = urlString.trim();
  if (!raw) {
    return { ok: false, error: "Empty URL" };
  }

  let parsed: URL;
  try {
    if (baseUrl) {
      parsed = new URL(raw, baseUrl);
    } else {
      parsed = new URL(withScheme(raw));
    }
  } catch {
    return { ok: false, error: `Malformed URL: ${raw}` };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { ok: false, error: `Unsupported scheme: ${parsed.protocol.replace(/:$/, "")}` };
  }

  const hostname = stripWww(parsed.hostname);
  if (!hostname) {
    return { ok: false, error: `Missing host: ${raw}` };
  }

  const port = parsed.port ? `:${parsed.port}` : "";
  const pathname = parsed.pathname.replace(/\/+$/, "") || "/";

  return { ok: true, url: `${parsed.protocol}//${hostname}${port}${pathname}` };
}

/** Registered host without `www.`; empty when the URL does not parse. */
export function extractDomain(urlString: string): string {
  try {
    return stripWww(new URL(urlString).hostname);
  } catch {
    return "";
  }
}

export function isInternal(urlString: string, baseHost: string): boolean {
  const raw = urlString.trim();
  if (!raw || !baseHost) return false;

  const scheme = raw.match(SCHEME_PATTERN);
  if (scheme && !/^https?$/i.test(scheme[1])) return false;
  if (!scheme && !raw.startsWith("//")) return true;

  const domain = extractDomain(raw.startsWith("//") ? `https:${raw}` : raw);
  const base = stripWww(baseHost);
  return domain === base || domain.endsWith(`.${base}`);
}

export function getRobotsUrl(rootUrl: string): string | null {
  try {
    const parsed = new URL(rootUrl);
    return `${parsed.protocol}//${parsed.host}/robots.txt`;
  } catch {
    return null;
  }
}
