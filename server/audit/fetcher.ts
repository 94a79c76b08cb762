import type { FetchRequest, FetchResult, PageFetcher } from "./types";
import { isSSRFSafe } from "./url-utils";
import { errorMessage } from "./errors";

const MAX_REDIRECTS = 5;

const HTML_CONTENT_TYPES = ["text/html", "application/xhtml"];

const TEXT_CONTENT_TYPES = ["text/", "application/xhtml", "application/xml", "+xml"];

export function isHtmlContentType(contentType: string | undefined | null): boolean {
  if (!contentType) return false;
  const lower = contentType.toLowerCase();
  return HTML_CONTENT_TYPES.some((type) => lower.includes(type));
}

function isTextContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const lower = contentType.toLowerCase();
  return TEXT_CONTENT_TYPES.some((type) => lower.includes(type));
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new Error("aborted"));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * One GET attempt with redirects followed by hand, so every hop can be
 * checked before it is requested. The timeout bounds the whole attempt,
 * host lookup and body included. Bodies of non-text responses are discarded unread.
 */
export async function fetchPage(url: string, request: FetchRequest): Promise<FetchResult> {
  const { timeoutMs, userAgent, blockPrivateNetworks = true, signal } = request;
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", onCallerAbort, { once: true });
  }

  try {
    let currentUrl = url;
    let redirectCount = 0;

    while (redirectCount <= MAX_REDIRECTS) {
      if (blockPrivateNetworks) {
        const ssrfCheck = await untilAborted(isSSRFSafe(currentUrl), controller.signal);
        if (!ssrfCheck.safe) {
          return { kind: "network_error", detail: `SSRF protection: ${ssrfCheck.reason}` };
        }
      }

      const response = await fetch(currentUrl, {
        signal: controller.signal,
        headers: {
          "User-Agent": userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
        redirect: "manual",
      });

      const location = response.headers.get("location");
      if (response.status >= 300 && response.status < 400 && location) {
        await response.body?.cancel();
        currentUrl = new URL(location, currentUrl).toString();
        redirectCount++;
        continue;
      }

      const headers = headersToRecord(response.headers);
      let body = "";
      if (isTextContentType(headers["content-type"])) {
        body = await response.text();
      } else {
        await response.body?.cancel();
      }

      return { kind: "success", status: response.status, headers, body, finalUrl: currentUrl };
    }

    return { kind: "network_error", detail: "Too many redirects" };
  } catch (e) {
    if (timedOut) {
      return { kind: "timeout" };
    }
    if (signal?.aborted) {
      return { kind: "network_error", detail: "Request aborted" };
    }
    return { kind: "network_error", detail: errorMessage(e) || "Unknown fetch error" };
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onCallerAbort);
  }
}

export const httpFetcher: PageFetcher = {
  fetch: fetchPage,
};
