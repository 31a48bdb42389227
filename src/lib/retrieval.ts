/**
 * Page retrieval for the search-and-scrape evidence provider.
 *
 * Fetches http(s) pages with manual redirect handling, refuses private and
 * loopback hosts at every hop, caps the body size and reduces HTML to text.
 *
 * @module retrieval
 */

import * as cheerio from "cheerio";
import dns from "dns/promises";
import net from "net";
import { URL } from "url";
import { ProviderError } from "./errors";
import { timeoutSignal } from "./web-search";

const MAX_BYTES = 2_000_000; // 2MB
const MAX_REDIRECTS = 5;
const FETCH_TIMEOUT_MS = 15_000;

export interface ExtractTextOptions {
  timeoutMs?: number;
  maxChars?: number;
  signal?: AbortSignal;
}

export type PageTextFetcher = (url: string, options?: ExtractTextOptions) => Promise<string>;

export function isPrivateIp(ip: string): boolean {
  if (net.isIP(ip) === 4) {
    const [a, b] = ip.split(".").map((x) => parseInt(x, 10));
    if (a === 0 || a === 10 || a === 127) return true;
    if (a === 169 && b === 254) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    if (a === 192 && b === 168) return true;
    if (a === 100 && b >= 64 && b <= 127) return true; // CGNAT 100.64.0.0/10
    if (a === 192 && b === 0) return true;
    if (a === 198 && (b === 18 || b === 19)) return true;
    if (a >= 224) return true;
    return false;
  }
  if (net.isIP(ip) === 6) {
    const lower = ip.toLowerCase();
    if (lower === "::1" || lower === "::") return true;
    if (lower.startsWith("fe80:")) return true;
    if (lower.startsWith("fc") || lower.startsWith("fd")) return true;
    return false;
  }
  return true;
}

function validateUrlForFetch(url: URL): void {
  if (!["http:", "https:"].includes(url.protocol)) {
    throw new Error("Only http/https URLs are allowed");
  }
  if (url.username || url.password) {
    throw new Error("URLs with embedded credentials are not allowed");
  }
}

async function checkHost(url: URL): Promise<void> {
  const hostLower = url.hostname.toLowerCase();
  if (hostLower === "localhost" || hostLower.endsWith(".localhost")) {
    throw new Error("Blocked URL host (localhost)");
  }

  if (net.isIP(url.hostname)) {
    if (isPrivateIp(url.hostname)) {
      throw new Error("Blocked URL host (private/loopback address)");
    }
    return;
  }

  const addrs = await dns.lookup(url.hostname, { all: true });
  for (const a of addrs) {
    if (isPrivateIp(a.address)) {
      throw new Error("Blocked URL host (private/loopback address)");
    }
  }
}

async function fetchWithSafeRedirects(initialUrl: URL, timeoutMs: number, signal?: AbortSignal): Promise<Response> {
  let current = new URL(initialUrl.toString());

  for (let i = 0; i <= MAX_REDIRECTS; i++) {
    validateUrlForFetch(current);
    await checkHost(current);

    const res = await fetch(current.toString(), { redirect: "manual", signal: timeoutSignal(timeoutMs, signal) });

    if (res.status >= 300 && res.status < 400) {
      const location = res.headers.get("location");
      if (!location) throw new Error("Redirect without location header");
      current = new URL(location, current);
      continue;
    }

    return res;
  }

  throw new Error("Too many redirects");
}

const BOILERPLATE_SELECTOR = "script, style, noscript, nav, footer, header, aside, .sidebar, .menu, .nav, .advertisement, .ad";
const BLOCK_SELECTOR = "br, p, li, h1, h2, h3, h4, h5, h6, div, tr";
const CONTENT_SELECTORS = ["article", "main", "[role='main']", ".content", "#content"];

/**
 * Reduce an HTML page to plain text: boilerplate removed, main content
 * preferred over the whole body, block ends turned into sentence breaks.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(BOILERPLATE_SELECTOR).remove();
  $(BLOCK_SELECTOR).after(". ");

  let content = "";
  for (const selector of CONTENT_SELECTORS) {
    const el = $(selector);
    if (el.length > 0) {
      content = el.text();
      break;
    }
  }
  if (!content) content = $("body").text();

  return content
    .replace(/\s+/g, " ")
    .replace(/(?:\s*\.\s*){2,}/g, ". ")
    .trim();
}

export async function extractTextFromUrl(urlStr: string, options: ExtractTextOptions = {}): Promise<string> {
  const url = new URL(urlStr);
  validateUrlForFetch(url);

  const res = await fetchWithSafeRedirects(url, options.timeoutMs ?? FETCH_TIMEOUT_MS, options.signal);
  if (!res.ok) {
    throw new ProviderError("page-fetch", res.status, false, `Fetch failed: ${res.status} for ${url.hostname}`);
  }

  const contentType = res.headers.get("content-type") ?? "";
  const reader = res.body?.getReader();
  if (!reader) throw new Error("No response body");

  let total = 0;
  const chunks: Uint8Array[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    if (value) {
      total += value.length;
      if (total > MAX_BYTES) {
        await reader.cancel();
        throw new Error("Response too large");
      }
      chunks.push(value);
    }
  }

  const raw = Buffer.concat(chunks).toString("utf-8");
  const text = contentType.includes("text/html") ? htmlToText(raw) : raw.trim();
  return options.maxChars !== undefined ? text.slice(0, options.maxChars) : text;
}
