/**
 * Guest credential bootstrap — scraping the web app shell.
 *
 * The HTML shell references the main bundle in a <script src> and sets the
 * guest token in an inline `document.cookie="gt=...";` assignment. The main
 * bundle embeds the web client's bearer token as a quoted 104-char literal.
 * Both documents are owned by the platform and change without notice.
 */

import { Cookie } from "tough-cookie";
import { BootstrapParseError } from "../errors";

const SCRIPT_TAG_PATTERN = /<script\b([^>]*)>([\s\S]*?)<\/script\s*>/gi;
const SRC_ATTRIBUTE_PATTERN = /(?:^|\s)src\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i;
const GUEST_TOKEN_COOKIE_PATTERN = /document\.cookie="(gt=.+?)";/;
const METADATA_PATTERN = /window\.__META_DATA__=(\{.+?\});/;
const BEARER_TOKEN_PATTERN = /"([a-zA-Z0-9%]{104})"/;

const MAIN_SCRIPT_MARKER = "main";

export interface BootstrapTarget {
  scriptUrl: string;
  guestToken: string;
  cookieFetchTime?: number; // window.__META_DATA__.cookies.fetchedTime, when the shell has it
}

interface ScriptElement {
  src?: string;
  text: string;
}

function* scanScripts(html: string): Generator<ScriptElement> {
  for (const match of html.matchAll(SCRIPT_TAG_PATTERN)) {
    const [, attributes = "", text = ""] = match;
    const src = SRC_ATTRIBUTE_PATTERN.exec(attributes);
    yield {
      src: src ? (src[1] ?? src[2] ?? src[3]) : undefined,
      text,
    };
  }
}

function parseGuestCookie(raw: string): string {
  const cookie = Cookie.parse(raw);
  if (!cookie || cookie.key !== "gt" || !cookie.value) {
    throw new BootstrapParseError(`Unparseable guest token cookie: ${raw.slice(0, 40)}`);
  }
  return cookie.value;
}

function parseCookieFetchTime(json: string): number | undefined {
  let metadata: unknown;
  try {
    metadata = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new BootstrapParseError(`Malformed window.__META_DATA__: ${reason}`);
  }

  if (typeof metadata !== "object" || metadata === null || !("cookies" in metadata)) return undefined;
  const { cookies } = metadata;
  if (typeof cookies !== "object" || cookies === null || !("fetchedTime" in cookies)) return undefined;
  return typeof cookies.fetchedTime === "number" ? cookies.fetchedTime : undefined;
}

/**
 * Find the main bundle URL and the guest token in the web app HTML.
 * When several scripts match, the last one wins.
 */
export function extractBootstrapTarget(html: string): BootstrapTarget {
  let scriptUrl: string | undefined;
  let guestToken: string | undefined;
  let cookieFetchTime: number | undefined;

  for (const script of scanScripts(html)) {
    if (script.src?.includes(MAIN_SCRIPT_MARKER)) {
      scriptUrl = script.src;
      continue;
    }

    const metadata = METADATA_PATTERN.exec(script.text);
    if (metadata) {
      cookieFetchTime = parseCookieFetchTime(metadata[1]);
      continue;
    }

    const cookie = GUEST_TOKEN_COOKIE_PATTERN.exec(script.text);
    if (cookie) {
      guestToken = parseGuestCookie(cookie[1]);
    }
  }

  if (!scriptUrl) throw new BootstrapParseError("No <script src> containing \"main\" in web app HTML");
  if (!guestToken) throw new BootstrapParseError("No document.cookie=\"gt=...\" assignment in web app HTML");

  return cookieFetchTime === undefined ? { scriptUrl, guestToken } : { scriptUrl, guestToken, cookieFetchTime };
}

export function extractBearerToken(scriptSource: string): string {
  const match = BEARER_TOKEN_PATTERN.exec(scriptSource);
  if (!match) throw new BootstrapParseError("No 104-character bearer token in main script");
  return match[1];
}
