/**
 * Guest session — the stateful side of the client.
 *
 * open() scrapes the web app for a bearer token and a guest token and pins
 * them as headers on every later call. The reads are single round trips that
 * hand the JSON to the pure decoders.
 *
 * Tokens are not refreshed. When calls start failing with 401/403, create a
 * new Session.
 */

import type { TimelinePage, User } from "../types/tweet";
import { UserResponseSchema } from "../types/graphql";
import { loadConfig, type Config } from "../config";
import {
  SessionNotReadyError,
  TimelineDecodeError,
  TweetDecodeError,
  UnexpectedStatusError,
  type RoostError,
} from "../errors";
import { extractBearerToken, extractBootstrapTarget } from "../scrapers/bootstrap";
import { buildClientEvent, buildTimeline, buildUserByHandle, type GraphqlRequest } from "../graphql/requests";
import { decodeTimeline } from "../parser/timeline";
import { child, ROOT_PATH } from "../parser/path";
import { parseUser } from "../parser/user";
import { FetchTransport, type HttpResponse, type Transport } from "./transport";

const HTTP_OK = 200;

export type SessionState = "UNINITIALIZED" | "READY";

export interface SessionOptions {
  transport?: Transport;
  config?: Config;
  log?: (message: string) => void;
  now?: () => number;
}

interface SessionCredentials {
  bearerToken: string;
  guestToken: string;
}

function mask(token: string): string {
  return token.length <= 8 ? "***" : `${token.slice(0, 4)}…${token.slice(-4)}`;
}

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export class Session {
  private readonly transport: Transport;
  private readonly config: Config;
  private readonly log: (message: string) => void;
  private readonly now: () => number;

  private credentials: SessionCredentials | null = null;
  private opening: Promise<void> | null = null;

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.transport =
      options.transport ??
      new FetchTransport({ userAgent: this.config.userAgent, timeoutMs: this.config.timeoutMs });
    this.log = options.log ?? console.log;
    this.now = options.now ?? Date.now;
  }

  get state(): SessionState {
    return this.credentials ? "READY" : "UNINITIALIZED";
  }

  /**
   * Bootstrap guest credentials. Safe to call again: a READY session returns
   * immediately, a concurrent call shares the in-flight bootstrap, and a failed
   * bootstrap leaves the session UNINITIALIZED so it can be retried.
   */
  async open(): Promise<void> {
    if (this.credentials) return;

    const inFlight =
      this.opening ??
      this.bootstrap().finally(() => {
        this.opening = null;
      });
    this.opening = inFlight;
    return inFlight;
  }

  async getUserByHandle(handle: string): Promise<User> {
    const body = await this.query(
      buildUserByHandle(handle),
      () => new TweetDecodeError(ROOT_PATH, "response body is not JSON")
    );

    const parsed = UserResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TweetDecodeError(child(ROOT_PATH, ...(parsed.error.issues[0]?.path ?? [])));
    }
    return parseUser(parsed.data.data.user.result, child(ROOT_PATH, "data", "user", "result"));
  }

  async getTimelinePage(
    userId: string,
    count?: number,
    cursor?: string,
    includePinned = true
  ): Promise<TimelinePage> {
    const body = await this.query(
      buildTimeline(userId, count, cursor),
      () => new TimelineDecodeError("response body is not JSON")
    );
    return decodeTimeline(body, includePinned);
  }

  // ── Internals ──

  private async bootstrap(): Promise<void> {
    const webappUrl = this.config.webappUrl;
    this.log(`[session] Fetching web app shell from ${webappUrl}`);
    const html = await (await this.expectOk(webappUrl, await this.transport.get(webappUrl))).text();

    const target = extractBootstrapTarget(html);
    const scriptUrl = new URL(target.scriptUrl, webappUrl).toString();

    this.log(`[session] Fetching main script ${scriptUrl}`);
    const script = await (await this.expectOk(scriptUrl, await this.transport.get(scriptUrl))).text();
    const bearerToken = extractBearerToken(script);

    const credentials = { bearerToken, guestToken: target.guestToken };

    if (target.cookieFetchTime !== undefined && this.config.reportClientEvent) {
      const event = buildClientEvent(target.cookieFetchTime, this.now());
      const eventUrl = joinUrl(this.config.apiUrl, event.path);
      const res = await this.transport.post(eventUrl, { form: event.form, headers: this.authHeaders(credentials) });
      await (await this.expectOk(eventUrl, res)).discard?.();
    }

    this.credentials = credentials;
    this.log(`[session] Ready (bearer ${mask(bearerToken)}, guest ${mask(target.guestToken)})`);
  }

  private authHeaders(credentials: SessionCredentials): Record<string, string> {
    return {
      Authorization: `Bearer ${credentials.bearerToken}`,
      "x-guest-token": credentials.guestToken,
    };
  }

  private async query(request: GraphqlRequest, notJson: () => RoostError): Promise<unknown> {
    if (!this.credentials) throw new SessionNotReadyError();

    const url = joinUrl(this.config.graphqlUrl, request.path);
    const res = await this.transport.get(url, {
      params: request.queryParams,
      headers: this.authHeaders(this.credentials),
    });
    const ok = await this.expectOk(url, res);
    try {
      return await ok.json();
    } catch (error) {
      this.log(`[session] ${url} -> 200 with a non-JSON body: ${error instanceof Error ? error.message : String(error)}`);
      throw notJson();
    }
  }

  private async expectOk(url: string, res: HttpResponse): Promise<HttpResponse> {
    if (res.status !== HTTP_OK) {
      this.log(`[session] ${url} -> ${res.status}`);
      await res.discard?.();
      throw new UnexpectedStatusError(res.status, url);
    }
    return res;
  }
}
